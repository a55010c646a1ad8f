import { FunctionFlowBuilder } from "./flowBuilder";
import {
  AstContractMember,
  AstFunctionDefinition,
  AstSite,
  AstSourceUnit,
  AstTopLevelDeclaration,
  AstVariableDeclaration,
  SourceLocation,
} from "../ast";
import { Cfg, CfgNodeIdx, FunctionFlow } from "../cfg";
import { CompilationUnit, ProjectName } from "../ir";
import { PtrguardContext } from "../../context";
import { ExecutionException, throwZodError } from "../../exceptions";
import { unreachable } from "../../util";
import fs from "fs";
import JSONbig from "json-bigint";
import path from "path";
import { z } from "zod";

const AstIdSchema = z.number().int().nonnegative();

const LocationSchema = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .refine((loc) => loc.end >= loc.start, {
    message: "Location must not end before it starts",
  });

const SiteSchema = z.object({
  id: AstIdSchema,
  loc: LocationSchema,
});

const OccurrenceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("declaration"), variable: AstIdSchema }),
  z.object({
    kind: z.literal("assignment"),
    variable: AstIdSchema,
    site: SiteSchema.optional(),
  }),
  z.object({
    kind: z.literal("inline_reference"),
    variable: AstIdSchema,
    site: SiteSchema.optional(),
  }),
  z.object({
    kind: z.literal("access"),
    variable: AstIdSchema,
    site: SiteSchema.optional(),
  }),
]);

const CfgNodeSchema = z.object({
  occurrences: z.array(OccurrenceSchema).default([]),
  exits: z.array(z.number().int().nonnegative()).default([]),
});

const CfgSchema = z.object({
  entry: z.number().int().nonnegative(),
  exit: z.number().int().nonnegative(),
  nodes: z.array(CfgNodeSchema).min(1),
});

const VariableSchema = z.object({
  id: AstIdSchema,
  name: z.string(),
  storage: z
    .enum(["storage", "memory", "calldata", "default"])
    .default("default"),
  loc: LocationSchema,
});

const FunctionSchema = z.object({
  kind: z.literal("function"),
  id: AstIdSchema,
  name: z.string(),
  implemented: z.boolean().default(true),
  loc: LocationSchema,
  variables: z.array(VariableSchema).default([]),
  cfg: CfgSchema.optional(),
});

const NamedEntitySchema = {
  id: AstIdSchema,
  name: z.string(),
  loc: LocationSchema,
};

const ContractMemberSchema = z.discriminatedUnion("kind", [
  FunctionSchema,
  z.object({ kind: z.literal("variable"), ...NamedEntitySchema }),
  z.object({ kind: z.literal("struct"), ...NamedEntitySchema }),
  z.object({ kind: z.literal("event"), ...NamedEntitySchema }),
]);

const TopLevelSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("contract"),
    ...NamedEntitySchema,
    members: z.array(ContractMemberSchema).default([]),
  }),
  FunctionSchema,
  z.object({ kind: z.literal("struct"), ...NamedEntitySchema }),
  z.object({
    kind: z.literal("import"),
    id: AstIdSchema,
    path: z.string(),
    loc: LocationSchema,
  }),
  z.object({
    kind: z.literal("pragma"),
    id: AstIdSchema,
    literals: z.array(z.string()),
    loc: LocationSchema,
  }),
]);

const ProgramSchema = z.object({
  name: z.string().optional(),
  sources: z.array(
    z.object({
      path: z.string(),
      content: z.string().optional(),
      nodes: z.array(TopLevelSchema).default([]),
    }),
  ),
});

export type ProgramJson = z.infer<typeof ProgramSchema>;
type FunctionJson = z.infer<typeof FunctionSchema>;
type ContractMemberJson = z.infer<typeof ContractMemberSchema>;
type TopLevelJson = z.infer<typeof TopLevelSchema>;
type LocationJson = z.infer<typeof LocationSchema>;
type SiteJson = z.infer<typeof SiteSchema>;
type VariableJson = z.infer<typeof VariableSchema>;
type CfgJson = z.infer<typeof CfgSchema>;

/**
 * Creates compilation units from program files: JSON documents describing
 * source units, their declarations and the CFGs of the functions.
 */
export class ProgramLoader {
  private readonly cfg = new Cfg();
  /** The file the location currently converted belongs to. */
  private file: string = "";
  /** Identifiers of the functions converted so far. */
  private readonly functionIds = new Set<number>();

  private constructor(private readonly ctx: PtrguardContext) {}

  /**
   * Reads and validates the program file.
   * @throws ExecutionException if the file is missing or malformed.
   */
  public static fromFile(
    ctx: PtrguardContext,
    programPath: string,
  ): CompilationUnit {
    const resolvedPath = path.resolve(programPath);
    if (!fs.existsSync(resolvedPath)) {
      throw ExecutionException.make(
        `Unable to find program file at ${resolvedPath}`,
      );
    }
    let json: unknown;
    try {
      json = JSONbig.parse(fs.readFileSync(resolvedPath, "utf8"));
    } catch (err) {
      throw ExecutionException.make(
        `Could not parse program file (${resolvedPath}): ${err instanceof Error ? err.message : err}`,
      );
    }
    const projectName = path.basename(resolvedPath, ".json") as ProjectName;
    return this.fromJson(ctx, json, projectName, resolvedPath);
  }

  /**
   * Validates an already parsed program.
   * @param projectName Name used if the program does not define one.
   * @param origin Where the program comes from; shown in error messages.
   */
  public static fromJson(
    ctx: PtrguardContext,
    json: unknown,
    projectName: ProjectName,
    origin: string = projectName,
  ): CompilationUnit {
    let program: ProgramJson;
    try {
      program = ProgramSchema.parse(json);
    } catch (err) {
      throwZodError(err, {
        msg: `Incorrect program file ${origin}:`,
      });
    }
    const name =
      program.name === undefined ? projectName : (program.name as ProjectName);
    return new ProgramLoader(ctx).build(name, program);
  }

  private build(
    projectName: ProjectName,
    program: ProgramJson,
  ): CompilationUnit {
    const sources = program.sources.map((source): AstSourceUnit => {
      this.file = source.path;
      return {
        kind: "source_unit",
        path: source.path,
        content: source.content,
        nodes: source.nodes.map((node) => this.convertTopLevel(node)),
      };
    });
    this.ctx.logger.debug(
      `${projectName}: loaded ${sources.length} source unit(s) and ${this.cfg.size} function CFG(s)`,
    );
    return new CompilationUnit(projectName, sources, this.cfg);
  }

  private convertTopLevel(node: TopLevelJson): AstTopLevelDeclaration {
    switch (node.kind) {
      case "contract":
        return {
          kind: "contract_def",
          id: node.id,
          name: node.name,
          loc: this.loc(node.loc),
          members: node.members.map((member) => this.convertMember(member)),
        };
      case "function":
        return this.convertFunction(node);
      case "struct":
        return {
          kind: "struct_def",
          id: node.id,
          name: node.name,
          loc: this.loc(node.loc),
        };
      case "import":
        return {
          kind: "import",
          id: node.id,
          path: node.path,
          loc: this.loc(node.loc),
        };
      case "pragma":
        return {
          kind: "pragma",
          id: node.id,
          literals: node.literals,
          loc: this.loc(node.loc),
        };
      default:
        unreachable(node);
    }
  }

  private convertMember(member: ContractMemberJson): AstContractMember {
    switch (member.kind) {
      case "function":
        return this.convertFunction(member);
      case "variable":
        return {
          kind: "state_variable",
          id: member.id,
          name: member.name,
          loc: this.loc(member.loc),
        };
      case "struct":
        return {
          kind: "struct_def",
          id: member.id,
          name: member.name,
          loc: this.loc(member.loc),
        };
      case "event":
        return {
          kind: "event_def",
          id: member.id,
          name: member.name,
          loc: this.loc(member.loc),
        };
      default:
        unreachable(member);
    }
  }

  private convertFunction(node: FunctionJson): AstFunctionDefinition {
    const fn: AstFunctionDefinition = {
      kind: "function_def",
      id: node.id,
      name: node.name,
      implemented: node.implemented,
      loc: this.loc(node.loc),
    };
    if (this.functionIds.has(fn.id)) {
      throw ExecutionException.make(
        `${this.file}: function #${fn.id} (${fn.name}) is defined twice`,
        { loc: fn.loc },
      );
    }
    this.functionIds.add(fn.id);
    if (!fn.implemented) {
      if (node.cfg !== undefined) {
        this.ctx.logger.warn(
          `${this.file}: ignoring the CFG of ${fn.name} which has no body`,
        );
      }
      return fn;
    }
    if (node.cfg === undefined) {
      throw ExecutionException.make(
        `${this.file}: function ${fn.name} is implemented but has no CFG`,
        { loc: fn.loc },
      );
    }
    this.cfg.addFunctionFlow(this.convertCfg(fn, node.variables, node.cfg));
    return fn;
  }

  private convertCfg(
    fn: AstFunctionDefinition,
    declared: VariableJson[],
    cfg: CfgJson,
  ): FunctionFlow {
    const variables = declared.reduce((acc, variable) => {
      if (acc.has(variable.id)) {
        throw ExecutionException.make(
          `${this.file}: variable #${variable.id} is declared twice in ${fn.name}`,
        );
      }
      acc.set(variable.id, {
        kind: "variable_decl",
        id: variable.id,
        name: variable.name,
        storage: variable.storage,
        loc: this.loc(variable.loc),
      });
      return acc;
    }, new Map<number, AstVariableDeclaration>());
    const findVariable = (id: number): AstVariableDeclaration => {
      const decl = variables.get(id);
      if (decl === undefined) {
        throw ExecutionException.make(
          `${this.file}: unknown variable #${id} referenced in the CFG of ${fn.name}`,
          { loc: fn.loc },
        );
      }
      return decl;
    };
    const checkIdx = (idx: number, what: string): CfgNodeIdx => {
      if (idx >= cfg.nodes.length) {
        throw ExecutionException.make(
          `${this.file}: ${what} of ${fn.name} refers to node #${idx} out of ${cfg.nodes.length}`,
          { loc: fn.loc },
        );
      }
      return idx as CfgNodeIdx;
    };

    const builder = new FunctionFlowBuilder(fn);
    const indices = cfg.nodes.map(() => builder.node());
    cfg.nodes.forEach((cfgNode, position) => {
      const idx = indices[position];
      cfgNode.occurrences.forEach((occ) => {
        const decl = findVariable(occ.variable);
        switch (occ.kind) {
          case "declaration":
            builder.declare(idx, decl);
            break;
          case "assignment":
            builder.assign(idx, decl, this.site(occ.site));
            break;
          case "inline_reference":
            builder.inlineReference(idx, decl, this.site(occ.site));
            break;
          case "access":
            builder.access(idx, decl, this.site(occ.site));
            break;
          default:
            unreachable(occ);
        }
      });
      cfgNode.exits.forEach((dst) =>
        builder.edge(idx, checkIdx(dst, `an edge of node #${position}`)),
      );
    });
    return builder.build(
      checkIdx(cfg.entry, "the entry"),
      checkIdx(cfg.exit, "the exit"),
    );
  }

  private site(site: SiteJson | undefined): AstSite | undefined {
    return site === undefined
      ? undefined
      : { id: site.id, loc: this.loc(site.loc) };
  }

  private loc(loc: LocationJson): SourceLocation {
    return { file: this.file, start: loc.start, end: loc.end };
  }
}
