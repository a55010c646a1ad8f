import { isSetSubsetOf, unionInto } from "../util";

export interface Semilattice<T> {
  /**
   * Determines if one element in the semilattice is less than or equal to another element.
   * @param a The element to compare.
   * @param b The element to compare against.
   * @returns `true` if `a` is less than or equal to `b`, otherwise `false`.
   */
  leq(a: T, b: T): boolean;
}

/**
 * Interface for a join semilattice that introduces the join operation.
 *
 * @template T The type of elements in the semilattice.
 */
export interface JoinSemilattice<T> extends Semilattice<T> {
  /**
   * Represents the bottom element of the lattice.
   * @returns A fresh bottom element.
   */
  bottom(): T;

  /**
   * Joins two elements of the semilattice, returning the least upper bound (lub) of the two elements.
   * @param a First element to join.
   * @param b Second element to join.
   * @returns The joined value.
   */
  join(a: T, b: T): T;
}

/**
 * A join semilattice whose elements can be joined in place.
 *
 * Fixpoint solvers use it to merge facts into a successor and to learn
 * whether the successor has to be processed again.
 */
export interface GrowingJoinSemilattice<T> extends JoinSemilattice<T> {
  /**
   * Joins `source` into `target`, mutating `target`.
   * @returns `true` iff `target` grew.
   */
  joinInto(target: T, source: T): boolean;

  /**
   * Returns a copy of `a` that can be mutated independently.
   */
  copy(a: T): T;
}

/**
 * Implementation of a join semilattice for sets.
 *
 * @template T The type of elements in the sets.
 */
export class SetJoinSemilattice<T> implements GrowingJoinSemilattice<Set<T>> {
  /**
   * Joins two sets by union.
   */
  join(a: Set<T>, b: Set<T>): Set<T> {
    return new Set([...a, ...b]);
  }

  joinInto(target: Set<T>, source: Set<T>): boolean {
    return unionInto(target, source);
  }

  /**
   * Returns the bottom element: empty set.
   */
  bottom(): Set<T> {
    return new Set();
  }

  copy(a: Set<T>): Set<T> {
    return new Set(a);
  }

  /**
   * Subset relation: a ≤ b iff a ⊆ b
   */
  leq(a: Set<T>, b: Set<T>): boolean {
    return isSetSubsetOf(a, b);
  }
}
