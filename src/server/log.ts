const verbose = process.env.NODE_ENV !== 'production';

// Per-event chatter (joins, deaths, dropped datagrams); silent in production.
export const log = {
  debug(...args: unknown[]): void {
    if (verbose) console.log(...args);
  },
};
