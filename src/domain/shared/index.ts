export { err, ok, unwrap } from './result';
export type { Err, Ok, Result } from './result';
