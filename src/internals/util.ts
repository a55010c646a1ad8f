/**
 * Additional generic TypeScript functions used in the project.
 *
 * @packageDocumentation
 */

import { InternalException } from "./exceptions";

/**
 * Adds all the elements of `rhs` to `lhs` in place.
 * @returns `true` iff `lhs` grew.
 */
export function unionInto<T>(lhs: Set<T>, rhs: ReadonlySet<T>): boolean {
  const sizeBefore = lhs.size;
  rhs.forEach((elem) => lhs.add(elem));
  return lhs.size > sizeBefore;
}

export const isSetSubsetOf = <T>(
  lhs: ReadonlySet<T>,
  rhs: ReadonlySet<T>,
): boolean => [...lhs].every((elem) => rhs.has(elem));

/**
 * Unreachable case for exhaustive checking.
 */
export function unreachable(value: never): never {
  throw InternalException.make(`Reached impossible case`, { node: value });
}

export const ansi = {
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  bold: "\x1b[1m",
  reset: "\x1b[0m",
};
