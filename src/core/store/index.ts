export { TransactionStore } from './transaction-store';
