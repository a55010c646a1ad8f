import {
  compilationUnit,
  functionDef,
  loc,
  quietContext,
  site,
  variable,
} from "./testUtil";
import { DiagnosticSink, Severity } from "../src/internals/diagnostics";
import {
  AstVariableDeclaration,
  CfgNodeIdx,
  FunctionFlow,
  FunctionFlowBuilder,
  OccurrenceKind,
  VariableOccurrence,
  compareOccurrences,
} from "../src/internals/ir";
import { SuccessPolicies } from "../src/passes/pass";
import {
  DECLARED_HERE,
  UNINITIALIZED_ACCESS_MESSAGE,
  UninitializedStorageAccess,
  findUninitializedAccesses,
} from "../src/passes/builtin/uninitializedStorageAccess";

const s = variable(10, "s", "storage", 100);

/**
 * Declares `decl` at the entry, branches into two arms that optionally
 * assign it, and accesses it after the join point.
 */
function branchFlow(
  decl: AstVariableDeclaration,
  assignLeft: boolean,
  assignRight: boolean,
): FunctionFlow {
  const builder = new FunctionFlowBuilder(functionDef(1, "branch"));
  const entry = builder.node();
  const left = builder.node();
  const right = builder.node();
  const join = builder.node();
  const exit = builder.node();
  builder.declare(entry, decl).edge(entry, left).edge(entry, right);
  if (assignLeft) builder.assign(left, decl, site(20, 120));
  if (assignRight) builder.assign(right, decl, site(21, 130));
  builder
    .edge(left, join)
    .edge(right, join)
    .access(join, decl, site(22, 140))
    .edge(join, exit);
  return builder.build(entry, exit);
}

/**
 * A single node followed by the exit node.
 */
function straightFlow(
  id: number,
  fill: (builder: FunctionFlowBuilder, node: CfgNodeIdx) => void,
): FunctionFlow {
  const builder = new FunctionFlowBuilder(functionDef(id, `f${id}`));
  const body = builder.node();
  const exit = builder.node();
  fill(builder, body);
  builder.edge(body, exit);
  return builder.build(body, exit);
}

function run(...flows: FunctionFlow[]): DiagnosticSink {
  const sink = new DiagnosticSink();
  new UninitializedStorageAccess(quietContext()).analyze(
    compilationUnit(flows),
    sink,
  );
  return sink;
}

describe("UninitializedStorageAccess", () => {
  it("reports an access without any assignment", () => {
    const flow = straightFlow(1, (b, n) =>
      b.declare(n, s).access(n, s, site(30, 150)),
    );
    const diagnostics = run(flow).getDiagnostics();
    expect(diagnostics).toEqual([
      {
        passId: "UninitializedStorageAccess",
        severity: Severity.ERROR,
        message: UNINITIALIZED_ACCESS_MESSAGE,
        location: loc(150),
        secondaryLocations: [{ message: DECLARED_HERE, location: loc(100) }],
      },
    ]);
  });

  it("reports an access if only one branch assigns", () => {
    const diagnostics = run(branchFlow(s, true, false)).getDiagnostics();
    expect(diagnostics.length).toBe(1);
    expect(diagnostics[0].location).toEqual(loc(140));
  });

  it("accepts an access if both branches assign", () => {
    expect(run(branchFlow(s, true, true)).size).toBe(0);
  });

  it("accepts an access after an unconditional assignment", () => {
    const flow = straightFlow(1, (b, n) =>
      b.declare(n, s).assign(n, s, site(30, 150)).access(n, s, site(31, 160)),
    );
    expect(run(flow).size).toBe(0);
  });

  it("treats inline references as assignments", () => {
    const flow = straightFlow(1, (b, n) =>
      b
        .declare(n, s)
        .inlineReference(n, s, site(30, 150))
        .access(n, s, site(31, 160)),
    );
    expect(run(flow).size).toBe(0);
  });

  it("ignores variables not located in storage", () => {
    const m = variable(11, "m", "memory", 105);
    const flow = straightFlow(1, (b, n) =>
      b.declare(n, m).access(n, m, site(30, 150)),
    );
    expect(run(flow).size).toBe(0);
    expect(run(branchFlow(m, true, false)).size).toBe(0);
  });

  it("reports an access before an assignment in a loop body once", () => {
    const builder = new FunctionFlowBuilder(functionDef(1, "loop"));
    const entry = builder.node();
    const header = builder.node();
    const body = builder.node();
    const exit = builder.node();
    builder
      .declare(entry, s)
      .edge(entry, header)
      .edge(header, body)
      .edge(header, exit)
      .access(body, s, site(30, 150))
      .assign(body, s, site(31, 160))
      .edge(body, header);
    const diagnostics = run(builder.build(entry, exit)).getDiagnostics();
    expect(diagnostics.map((d) => d.location)).toEqual([loc(150)]);
  });

  it("accepts accesses in a loop after an assignment on all paths", () => {
    const builder = new FunctionFlowBuilder(functionDef(1, "loop"));
    const entry = builder.node();
    const header = builder.node();
    const body = builder.node();
    const exit = builder.node();
    builder
      .declare(entry, s)
      .assign(entry, s, site(30, 140))
      .edge(entry, header)
      .edge(header, body)
      .edge(header, exit)
      .access(body, s, site(31, 150))
      .assign(body, s, site(32, 160))
      .edge(body, header);
    expect(run(builder.build(entry, exit)).size).toBe(0);
  });

  it("analyzes nodes that receive no facts from their predecessors", () => {
    const builder = new FunctionFlowBuilder(functionDef(1, "f"));
    const entry = builder.node();
    const body = builder.node();
    const exit = builder.node();
    builder
      .edge(entry, body)
      .declare(body, s)
      .access(body, s, site(30, 150))
      .edge(body, exit);
    expect(run(builder.build(entry, exit)).size).toBe(1);
  });

  it("does not report accesses that cannot reach the exit", () => {
    const builder = new FunctionFlowBuilder(functionDef(1, "f"));
    const entry = builder.node();
    const exit = builder.node();
    builder.declare(entry, s).access(entry, s, site(30, 150));
    expect(run(builder.build(entry, exit)).size).toBe(0);
  });

  it("reports accesses ordered by their position", () => {
    const t = variable(12, "t", "storage", 110);
    const flow = straightFlow(1, (b, n) =>
      b
        .declare(n, s)
        .declare(n, t)
        .access(n, t, site(30, 170))
        .access(n, s, site(31, 160))
        .access(n, s, site(32, 150)),
    );
    expect(run(flow).getDiagnostics().map((d) => d.location.start)).toEqual([
      150, 160, 170,
    ]);
  });

  it("locates accesses without a site at the declaration", () => {
    const flow = straightFlow(1, (b, n) =>
      b.declare(n, s).access(n, s).access(n, s, site(30, 150)),
    );
    expect(run(flow).getDiagnostics().map((d) => d.location)).toEqual([
      loc(150),
      loc(100),
    ]);
  });

  it("reports functions in their declaration order", () => {
    const first = straightFlow(2, (b, n) =>
      b.declare(n, s).access(n, s, site(30, 300)),
    );
    const second = straightFlow(1, (b, n) =>
      b.declare(n, s).access(n, s, site(31, 200)),
    );
    expect(
      run(first, second)
        .getDiagnostics()
        .map((d) => d.location.start),
    ).toEqual([300, 200]);
  });

  it("produces the same output for both worklist orders", () => {
    const flows = [branchFlow(s, true, false), branchFlow(s, false, false)];
    const lifo = flows.map((flow) =>
      findUninitializedAccesses(flow, "lifo").accesses,
    );
    const fifo = flows.map((flow) =>
      findUninitializedAccesses(flow, "fifo").accesses,
    );
    expect(fifo).toEqual(lifo);
    expect(lifo.map((accesses) => accesses.length)).toEqual([1, 1]);
  });

  it("produces the same output on repeated runs", () => {
    const flow = branchFlow(s, false, false);
    expect(run(flow).getDiagnostics()).toEqual(run(flow).getDiagnostics());
  });

  describe("success policies", () => {
    const clean = (): FunctionFlow => branchFlow(s, true, true);
    const dirty = (): FunctionFlow => branchFlow(s, false, true);

    it("fails if the pass reports an error", () => {
      const sink = new DiagnosticSink();
      const pass = new UninitializedStorageAccess(quietContext());
      expect(pass.analyze(compilationUnit([dirty()]), sink)).toBe(false);
    });

    it("fails on unrelated errors with the sink policy", () => {
      const sink = new DiagnosticSink();
      sink.error("Other", loc(1), [], "unrelated");
      const pass = new UninitializedStorageAccess(quietContext());
      expect(pass.analyze(compilationUnit([clean()]), sink)).toBe(false);
      expect(sink.size).toBe(1);
    });

    it("ignores unrelated errors with the pass policy", () => {
      const sink = new DiagnosticSink();
      sink.error("Other", loc(1), [], "unrelated");
      const pass = new UninitializedStorageAccess(
        quietContext({ successPolicy: "pass" }),
      );
      expect(pass.analyze(compilationUnit([clean()]), sink)).toBe(true);
      expect(
        pass.analyze(
          compilationUnit([clean()]),
          sink,
          SuccessPolicies.sink,
        ),
      ).toBe(false);
    });

    it("succeeds if the sink contains only warnings", () => {
      const sink = new DiagnosticSink();
      sink.warning("Other", loc(1), [], "unrelated");
      const pass = new UninitializedStorageAccess(quietContext());
      expect(pass.analyze(compilationUnit([clean()]), sink)).toBe(true);
    });
  });
});

describe("compareOccurrences", () => {
  it("orders occurrences without a site last", () => {
    const withSite = new VariableOccurrence(
      OccurrenceKind.Access,
      s,
      site(1, 500),
    );
    const withoutSite = new VariableOccurrence(OccurrenceKind.Declaration, s);
    expect(
      [withoutSite, withSite].sort(compareOccurrences).map((o) => o.kind),
    ).toEqual([OccurrenceKind.Access, OccurrenceKind.Declaration]);
  });

  it("breaks ties by declaration, kind and site", () => {
    const t = variable(9, "t");
    const byKind = new VariableOccurrence(
      OccurrenceKind.Access,
      t,
      site(5, 10),
    );
    const bySite = new VariableOccurrence(
      OccurrenceKind.Access,
      s,
      site(4, 10),
    );
    const first = new VariableOccurrence(
      OccurrenceKind.Assignment,
      s,
      site(6, 10),
    );
    const last = new VariableOccurrence(OccurrenceKind.Access, s, site(7, 10));
    expect([last, bySite, first, byKind].sort(compareOccurrences)).toEqual([
      byKind,
      first,
      bySite,
      last,
    ]);
  });
});
