import initSqlJs from 'sql.js';
import type { SqlJsStatic } from 'sql.js';

let sqlJs: Promise<SqlJsStatic> | undefined;

/**
 * The sql.js module, compiled once per process. The wasm binary ships inside
 * the package and is located beside its loader.
 */
export function loadSqlJs(): Promise<SqlJsStatic> {
  // sql.js is CommonJS and sets `module.exports.default` to itself, so
  // `.default` is the init function under either module interop
  sqlJs ??= initSqlJs.default();
  return sqlJs;
}
