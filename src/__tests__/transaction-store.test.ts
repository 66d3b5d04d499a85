import { TransactionStore } from '../core/store/transaction-store';
import { transaction } from './helpers/transactions';

describe('TransactionStore', () => {
  const a = transaction('/a', 'A');
  const b = transaction('/b', 'B');
  const c = transaction('/c', 'C');

  it('pops from the head in load order and signals exhaustion with undefined', () => {
    const store = new TransactionStore([a, b]);
    expect(store.popFront()).toBe(a);
    expect(store.popFront()).toBe(b);
    expect(store.popFront()).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('pushFront restores a popped transaction as the next one', () => {
    const store = new TransactionStore([a, b]);
    const head = store.popFront();
    expect(head).toBe(a);
    if (head) store.pushFront(head);
    expect(store.snapshot()).toEqual([a, b]);
  });

  it('pushBack appends at the tail', () => {
    const store = new TransactionStore();
    store.pushBack(a);
    store.pushBack(b);
    expect(store.snapshot()).toEqual([a, b]);
  });

  it('loadFrom replaces the contents wholesale', () => {
    const store = new TransactionStore([a]);
    store.loadFrom([b, c]);
    expect(store.snapshot()).toEqual([b, c]);
  });

  it('snapshot is a copy unaffected by later changes', () => {
    const store = new TransactionStore([a, b]);
    const snap = store.snapshot();
    store.popFront();
    store.pushBack(c);
    expect(snap).toEqual([a, b]);
    expect(store.snapshot()).toEqual([b, c]);
  });
});
