const SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/** Quotes a single argument for /bin/sh. */
const shellQuote = (arg: string) =>
  SAFE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

export default shellQuote;
