import { AstSite, AstVariableDeclaration, compareSourceLocations } from "./ast";

/**
 * The way a variable is touched at a program point.
 *
 * The numeric values are used as the last ordering key of reported
 * occurrences and must stay stable.
 */
export enum OccurrenceKind {
  Declaration,
  Assignment,
  /**
   * Any reference from inline assembly. It is not known whether the
   * reference writes to the variable.
   */
  InlineReference,
  Access,
}

/**
 * A single occurrence of a variable within a CFG node.
 *
 * Occurrences are compared by identity: two reads of the same variable are
 * two different occurrences.
 */
export class VariableOccurrence {
  /**
   * @param kind Kind of the occurrence.
   * @param declaration The variable this occurrence refers to.
   * @param site The expression the occurrence happens in. Always `undefined`
   *        for declarations, which are located by the declaration itself.
   */
  constructor(
    public readonly kind: OccurrenceKind,
    public readonly declaration: AstVariableDeclaration,
    public readonly site: AstSite | undefined = undefined,
  ) {}

  /**
   * Returns the location to highlight when reporting this occurrence.
   */
  public location(): AstSite["loc"] {
    return this.site === undefined ? this.declaration.loc : this.site.loc;
  }
}

/**
 * Total order on occurrences independent of the order they were collected in.
 *
 * Keys, in order: source position of the site (occurrences without a site go
 * last), declaration id, occurrence kind, site id.
 */
export function compareOccurrences(
  lhs: VariableOccurrence,
  rhs: VariableOccurrence,
): number {
  if (lhs.site !== undefined && rhs.site !== undefined) {
    const byPosition = compareSourceLocations(lhs.site.loc, rhs.site.loc);
    if (byPosition !== 0) return byPosition;
  } else if (lhs.site !== undefined) {
    return -1;
  } else if (rhs.site !== undefined) {
    return 1;
  }
  return (
    lhs.declaration.id - rhs.declaration.id ||
    lhs.kind - rhs.kind ||
    (lhs.site?.id ?? 0) - (rhs.site?.id ?? 0)
  );
}
