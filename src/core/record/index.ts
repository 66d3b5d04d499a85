export { RecordEngine } from './record-engine';
