/**
 * MockableAgent end to end: options, env mode, record, playback, fallback and the
 * close()/save() lifecycle. Real requests go to an in-process transport.
 */
import fs from 'fs';
import os from 'os';
import path from 'path';

import { MockableAgent, withMockable } from '../agent';
import { compareRecordings } from '../cli/compare';
import { MockableConfigError, UnrecognizedRequestError } from '../errors';
import { retrieve, store } from '../store/recording-file';
import { API, transaction } from './helpers/transactions';

/** Answers every request with `body of <path>`; 404 for paths under /missing. */
function fakeServer() {
  return jest.fn(async (request: Request) => {
    const { pathname } = new URL(request.url);
    const status = pathname.startsWith('/missing') ? 404 : 200;
    return new Response(`body of ${pathname}`, { status, headers: { 'content-type': 'text/plain' } });
  });
}

function unreachable() {
  return jest.fn(async (request: Request): Promise<Response> => {
    throw new Error(`unexpected real request to ${request.url}`);
  });
}

describe('MockableAgent', () => {
  let dir: string;
  let logger: { warn: jest.Mock };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mockable-agent-'));
    logger = { warn: jest.fn() };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('options', () => {
    it('defaults to passthrough', () => {
      const agent = new MockableAgent({ env: {} });
      expect(agent.mode).toBe('passthrough');
      expect(agent.file).toBeUndefined();
      expect(agent.transactions).toEqual([]);
    });

    it.each([
      [{ mode: 'replay' }, `[Mockable] Invalid mode "replay". Must be one of 'env', 'record', 'playback', or 'passthrough'`],
      [{ mode: 'record' }, '[Mockable] You must specify a recording file'],
      [{ mode: 'playback' }, '[Mockable] You must specify a recording file'],
      [
        { mode: 'record', file: 'x.json', unrecognized: 'ignore' },
        `[Mockable] Invalid unrecognized "ignore". Must be one of 'exception', 'null', or 'fallback'`,
      ],
      [
        { mode: 'env', file: 'x.json' },
        "[Mockable] Do not specify 'file' when 'mode' is 'env'. Use the MOCKABLE_FILE environment variable instead",
      ],
    ])('rejects %o', (options, message) => {
      expect(() => new MockableAgent({ ...options, env: {} })).toThrow(MockableConfigError);
      expect(() => new MockableAgent({ ...options, env: {} })).toThrow(message);
    });

    it('fails at construction when the playback file does not exist', () => {
      const file = path.join(dir, 'absent.json');
      expect(() => new MockableAgent({ mode: 'playback', file })).toThrow(`[Mockable] Playback file ${file} not found`);
    });

    it('takes mode and file from the environment in mode env', () => {
      const file = path.join(dir, 'env.json');
      const agent = new MockableAgent({ mode: 'env', env: { MOCKABLE_MODE: 'record', MOCKABLE_FILE: file } });
      expect(agent.mode).toBe('record');
      expect(agent.file).toBe(file);
    });

    it('falls back to passthrough when MOCKABLE_MODE is unset', () => {
      expect(new MockableAgent({ mode: 'env', env: {} }).mode).toBe('passthrough');
    });

    it('rejects an invalid MOCKABLE_MODE', () => {
      expect(() => new MockableAgent({ mode: 'env', env: { MOCKABLE_MODE: 'env' } })).toThrow(
        `[Mockable] Invalid MOCKABLE_MODE "env". Must be one of 'record', 'playback', or 'passthrough'`
      );
    });
  });

  describe('passthrough', () => {
    it('sends every request through the transport and records nothing', async () => {
      const transport = fakeServer();
      const agent = new MockableAgent({ transport });

      const response = await agent.fetch(`${API}/items`);

      expect(await response.text()).toBe('body of /items');
      expect(transport).toHaveBeenCalledTimes(1);
      expect(agent.transactions).toEqual([]);
      await agent.close();
    });
  });

  describe('record', () => {
    it('records every transaction and writes them on close', async () => {
      const file = path.join(dir, 'recording.json');
      const agent = new MockableAgent({ mode: 'record', file, transport: fakeServer() });

      const first = await agent.fetch(`${API}/users?id=1`);
      const second = await agent.fetch(`${API}/missing`, { method: 'POST', body: 'payload' });
      expect(await first.text()).toBe('body of /users');
      expect(second.status).toBe(404);
      await agent.close();

      const recorded = retrieve(file);
      expect(recorded.map((t) => `${t.request.method} ${t.request.url} -> ${t.response.status}`)).toEqual([
        `GET ${API}/users?id=1 -> 200`,
        `POST ${API}/missing -> 404`,
      ]);
      expect(recorded[1].request.body.toString()).toBe('payload');
      expect(recorded[1].response.body.toString()).toBe('body of /missing');
    });

    it('produces identical recordings for identical call sequences', async () => {
      const run = async (file: string) => {
        await withMockable({ mode: 'record', file, transport: fakeServer() }, async (agent) => {
          await agent.fetch(`${API}/a?x=1&y=2`);
          await agent.fetch(`${API}/b`, { method: 'PUT', body: '{"v":1}' });
        });
        return retrieve(file);
      };
      const left = await run(path.join(dir, 'left.json'));
      const right = await run(path.join(dir, 'right.json'));
      expect(compareRecordings(left, right)).toBeUndefined();
    });

    it('save() writes the transactions so far to a given file', async () => {
      const agent = new MockableAgent({ mode: 'record', file: path.join(dir, 'final.json'), transport: fakeServer() });
      await (await agent.fetch(`${API}/one`)).text();
      for (let i = 0; i < 100 && agent.transactions.length === 0; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
      const copy = path.join(dir, 'copy.json');

      agent.save(copy);

      expect(retrieve(copy).map((t) => t.request.url)).toEqual([`${API}/one`]);
      await agent.close();
      expect(retrieve(path.join(dir, 'final.json'))).toHaveLength(1);
    });
  });

  describe('playback', () => {
    function recording(...paths: string[]): string {
      const file = path.join(dir, 'playback.json');
      store(file, paths.map((p) => transaction(p, `${p.slice(1).toUpperCase()}!`)));
      return file;
    }

    it('replays a recording made by record mode without real requests', async () => {
      const file = path.join(dir, 'roundtrip.json');
      await withMockable({ mode: 'record', file, transport: fakeServer() }, async (agent) => {
        await agent.fetch(`${API}/users`);
        await agent.fetch(`${API}/missing`);
      });

      const transport = unreachable();
      const agent = new MockableAgent({ mode: 'playback', file, transport });
      const users = await agent.fetch(`${API}/users`);
      const missing = await agent.fetch(`${API}/missing`);

      expect(await users.text()).toBe('body of /users');
      expect(users.headers.get('x-mockable-regenerated')).toBe('1');
      expect(missing.status).toBe(404);
      expect(transport).not.toHaveBeenCalled();
      expect(agent.transactions).toEqual([]);
      await agent.close();
    });

    it('policy exception rejects an out-of-order request and keeps the queue', async () => {
      const agent = new MockableAgent({ mode: 'playback', file: recording('/a', '/b', '/c'), transport: unreachable() });

      expect(await (await agent.fetch(`${API}/a`)).text()).toBe('A!');
      await expect(agent.fetch(`${API}/c`)).rejects.toThrow(UnrecognizedRequestError);
      expect(agent.playback?.lastResult).toEqual({
        matched: false,
        dimension: 'url',
        explanation: "URL path mismatch: got '/c', expected '/b'",
      });
      expect(await (await agent.fetch(`${API}/b`)).text()).toBe('B!');
      expect(await (await agent.fetch(`${API}/c`)).text()).toBe('C!');
    });

    it('policy null answers an unmatched request with an empty 200', async () => {
      const agent = new MockableAgent({
        mode: 'playback',
        file: recording('/a', '/b', '/c'),
        unrecognized: 'null',
        transport: unreachable(),
      });

      expect(await (await agent.fetch(`${API}/a`)).text()).toBe('A!');
      const unmatched = await agent.fetch(`${API}/c`);
      expect(unmatched.status).toBe(200);
      expect(await unmatched.text()).toBe('');
      expect(unmatched.headers.get('x-mockable-request-recognized')).toBe('false');
      expect(unmatched.headers.get('x-mockable-request-match-exception')).toBe(
        "URL path mismatch: got '/c', expected '/b'"
      );
      expect(await (await agent.fetch(`${API}/b`)).text()).toBe('B!');
    });

    it('policy fallback sends the original request and marks the live response', async () => {
      const transport = fakeServer();
      const agent = new MockableAgent({ mode: 'playback', file: recording('/a'), unrecognized: 'fallback', transport });

      const response = await agent.fetch(`${API}/elsewhere?q=1`);

      expect(transport).toHaveBeenCalledTimes(1);
      expect(transport.mock.calls[0][0].url).toBe(`${API}/elsewhere?q=1`);
      expect(await response.text()).toBe('body of /elsewhere');
      expect(response.headers.get('x-mockable-request-recognized')).toBe('false');
      expect(response.headers.get('x-mockable-request-match-exception')).toBe(
        "URL path mismatch: got '/elsewhere', expected '/a'"
      );
      expect(agent.transactions).toHaveLength(1);
    });

    it('warns instead of saving outside record mode', async () => {
      const agent = new MockableAgent({ mode: 'playback', file: recording('/a'), logger });
      agent.save();
      expect(logger.warn).toHaveBeenCalledWith('[Mockable] save() only works in record mode');
      await agent.close();
    });
  });

  describe('close', () => {
    it('warns when the output directory does not exist', async () => {
      const file = path.join(dir, 'missing', 'recording.json');
      const agent = new MockableAgent({ mode: 'record', file, logger, transport: fakeServer() });

      await agent.close();

      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenNthCalledWith(
        1,
        `[Mockable] Cannot write output file: directory "${path.join(dir, 'missing')}" does not exist`
      );
      expect(logger.warn).toHaveBeenNthCalledWith(
        2,
        expect.stringMatching(/^\[Mockable\] Failed to write recording .*recording\.json: /)
      );
    });

    it('does nothing the second time', async () => {
      const file = path.join(dir, 'once.json');
      const agent = new MockableAgent({ mode: 'record', file, transport: fakeServer() });
      await agent.close();
      expect(fs.existsSync(file)).toBe(true);

      fs.rmSync(file);
      await agent.close();
      expect(fs.existsSync(file)).toBe(false);
    });

    it('withMockable closes the agent when the callback throws', async () => {
      const file = path.join(dir, 'thrown.json');
      await expect(
        withMockable({ mode: 'record', file, transport: fakeServer() }, async (agent) => {
          await agent.fetch(`${API}/before-failure`);
          throw new Error('test failed');
        })
      ).rejects.toThrow('test failed');

      expect(retrieve(file).map((t) => t.request.url)).toEqual([`${API}/before-failure`]);
    });

    it('withMockable returns the callback result', async () => {
      await expect(withMockable({ env: {} }, (agent) => agent.mode)).resolves.toBe('passthrough');
    });
  });
});
