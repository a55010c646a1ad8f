import {
  DiagnosticSink,
  Severity,
  formatDiagnostic,
  lineAndColumn,
  locationToString,
  severityToString,
} from "../src/internals/diagnostics";

const FILE = "Vault.sol";
const CONTENT = "function f() {\n    S storage s;\n    s.v = 1;\n}\n";

function sinkWithError(): DiagnosticSink {
  const sink = new DiagnosticSink();
  sink.error(
    "Pass",
    { file: FILE, start: 36, end: 39 },
    [{ message: "declared here", location: { file: FILE, start: 19, end: 30 } }],
    "bad access",
  );
  return sink;
}

describe("lineAndColumn", () => {
  it("converts offsets to 1-based positions", () => {
    expect(lineAndColumn("ab\ncd", 0)).toEqual({ line: 1, column: 1 });
    expect(lineAndColumn("ab\ncd", 3)).toEqual({ line: 2, column: 1 });
    expect(lineAndColumn("ab\ncd", 4)).toEqual({ line: 2, column: 2 });
  });
});

describe("locationToString", () => {
  it("uses offsets when the source text is unknown", () => {
    expect(locationToString({ file: FILE, start: 3, end: 8 }, new Map())).toBe(
      "Vault.sol:3-8",
    );
    expect(
      locationToString({ file: undefined, start: 3, end: 8 }, new Map()),
    ).toBe("<unknown>:3-8");
  });

  it("uses lines and columns when the source text is known", () => {
    expect(
      locationToString(
        { file: FILE, start: 19, end: 30 },
        new Map([[FILE, CONTENT]]),
      ),
    ).toBe("Vault.sol:2:5");
  });
});

describe("formatDiagnostic", () => {
  it("renders the source line and secondary locations", () => {
    const [diag] = sinkWithError().getDiagnostics();
    expect(formatDiagnostic(diag, new Map([[FILE, CONTENT]]))).toBe(
      [
        "Vault.sol:3:5: Error: bad access",
        "        s.v = 1;",
        "Vault.sol:2:5: Note: declared here",
      ].join("\n"),
    );
  });

  it("renders offsets without the source text", () => {
    const [diag] = sinkWithError().getDiagnostics();
    expect(formatDiagnostic(diag, new Map())).toBe(
      [
        "Vault.sol:36-39: Error: bad access",
        "Vault.sol:19-30: Note: declared here",
      ].join("\n"),
    );
  });

  it("colorizes the severity", () => {
    expect(severityToString(Severity.ERROR, { colorize: true })).toBe(
      "\x1b[1m\x1b[31mError\x1b[0m",
    );
    expect(severityToString(Severity.WARNING)).toBe("Warning");
  });
});

describe("DiagnosticSink", () => {
  it("distinguishes warnings from hard errors", () => {
    const sink = new DiagnosticSink();
    expect(sink.containsOnlyWarnings()).toBe(true);
    sink.warning("Pass", { file: FILE, start: 0, end: 1 }, [], "warning");
    expect(sink.containsOnlyWarnings()).toBe(true);
    expect(sinkWithError().containsOnlyWarnings()).toBe(false);
  });
});
