/**
 * Syntactic entities the analysis refers to: source units, their top-level
 * declarations and the variables declared within functions.
 *
 * The AST is produced by the compiler front end; ptrguard only reads it.
 *
 * @packageDocumentation
 */

export type AstId = number;

/**
 * A range of characters in a source file.
 */
export interface SourceLocation {
  /** Path of the source unit, if known. */
  readonly file: string | undefined;
  /** Offset of the first character. */
  readonly start: number;
  /** Offset past the last character. */
  readonly end: number;
}

/**
 * Where a variable lives when it holds a reference type.
 */
export type DataLocation = "storage" | "memory" | "calldata" | "default";

export type AstVariableDeclaration = {
  readonly kind: "variable_decl";
  readonly id: AstId;
  readonly name: string;
  readonly storage: DataLocation;
  readonly loc: SourceLocation;
};

/**
 * An expression or statement a variable occurrence is attached to.
 */
export type AstSite = {
  readonly id: AstId;
  readonly loc: SourceLocation;
};

export type AstFunctionDefinition = {
  readonly kind: "function_def";
  readonly id: AstId;
  readonly name: string;
  /** False for declarations without a body, e.g. interface functions. */
  readonly implemented: boolean;
  readonly loc: SourceLocation;
};

export type AstStateVariable = {
  readonly kind: "state_variable";
  readonly id: AstId;
  readonly name: string;
  readonly loc: SourceLocation;
};

export type AstStructDefinition = {
  readonly kind: "struct_def";
  readonly id: AstId;
  readonly name: string;
  readonly loc: SourceLocation;
};

export type AstEventDefinition = {
  readonly kind: "event_def";
  readonly id: AstId;
  readonly name: string;
  readonly loc: SourceLocation;
};

export type AstContractMember =
  | AstFunctionDefinition
  | AstStateVariable
  | AstStructDefinition
  | AstEventDefinition;

export type AstContractDefinition = {
  readonly kind: "contract_def";
  readonly id: AstId;
  readonly name: string;
  readonly members: readonly AstContractMember[];
  readonly loc: SourceLocation;
};

export type AstImportDirective = {
  readonly kind: "import";
  readonly id: AstId;
  readonly path: string;
  readonly loc: SourceLocation;
};

export type AstPragmaDirective = {
  readonly kind: "pragma";
  readonly id: AstId;
  readonly literals: readonly string[];
  readonly loc: SourceLocation;
};

export type AstTopLevelDeclaration =
  | AstContractDefinition
  | AstFunctionDefinition
  | AstStructDefinition
  | AstImportDirective
  | AstPragmaDirective;

export type AstSourceUnit = {
  readonly kind: "source_unit";
  readonly path: string;
  /** Source text used to render line and column numbers, if available. */
  readonly content: string | undefined;
  readonly nodes: readonly AstTopLevelDeclaration[];
};

/**
 * Returns true iff the variable refers to the persistent contract storage.
 */
export function isStorageLocated(decl: AstVariableDeclaration): boolean {
  return decl.storage === "storage";
}

/**
 * Compares two source locations by file, start and end offsets.
 * Locations without a file come before ones that have it.
 */
export function compareSourceLocations(
  lhs: SourceLocation,
  rhs: SourceLocation,
): number {
  if (lhs.file !== rhs.file) {
    if (lhs.file === undefined) return -1;
    if (rhs.file === undefined) return 1;
    return lhs.file < rhs.file ? -1 : 1;
  }
  return lhs.start - rhs.start || lhs.end - rhs.end;
}
