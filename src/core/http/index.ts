export * from './headers';
export { snapshotRequest, snapshotResponse, responseBody, requestBody } from './snapshot';
