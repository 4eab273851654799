import chalk from 'chalk';

/** Debug logger gated by PLANGRAPH_DEBUG env var */
export function debug(namespace: string, ...args: unknown[]): void {
  const filter = process.env.PLANGRAPH_DEBUG ?? '';
  if (!filter) return;
  if (filter === '*' || namespace.startsWith(filter.replace('*', ''))) {
    console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
  }
}
