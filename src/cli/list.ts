import type { Transaction } from '../types/schema';

/** One line per transaction: `#<index> <METHOD> <url> -> <status>`. */
export function formatTransactions(transactions: readonly Transaction[]): string[] {
  return transactions.map(
    ({ request, response }, i) => `#${i} ${request.method} ${request.url} -> ${response.status}`
  );
}
