export { RequestComparator, type RequestComparatorOptions } from './request-compare';
