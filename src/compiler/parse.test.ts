import { describe, expect, it } from "vitest";
import { DiagramParseError } from "./errors.js";
import { classifyLine, parseDiagram } from "./parse.js";

const layered = `flowchart TD
subgraph A["Layer One"]
  n1["Hello"]
  n2["World"]
end
subgraph B["Layer Two"]
  n3["Foo"]
end
n1 --> |go| n3`;

describe("classifyLine", () => {
  it("recognizes every line kind", () => {
    expect(classifyLine("   ")).toEqual({ kind: "blank" });
    expect(classifyLine("%% a comment")).toEqual({ kind: "comment" });
    expect(classifyLine("flowchart LR")).toEqual({ kind: "header" });
    expect(classifyLine("end")).toEqual({ kind: "laneClose" });
    expect(classifyLine('subgraph api["Application Layer"]')).toEqual({
      kind: "laneOpen",
      id: "api",
      label: "Application Layer",
    });
    expect(classifyLine("style n1 fill:#ffcc00,stroke:#333")).toEqual({ kind: "style", id: "n1", fill: "#ffcc00" });
    expect(classifyLine('n1["Hello"]')).toEqual({ kind: "node", id: "n1", label: "Hello" });
    expect(classifyLine("a --> |calls| b")).toEqual({ kind: "edge", from: "a", to: "b", label: "calls" });
    expect(classifyLine("a-->b")).toEqual({ kind: "edge", from: "a", to: "b" });
    expect(classifyLine("click n1 callback")).toEqual({ kind: "unknown" });
  });

  it("takes the lane label from the first quoted or bracketed run", () => {
    expect(classifyLine("subgraph ui [Presentation]")).toEqual({ kind: "laneOpen", id: "ui", label: "Presentation" });
    expect(classifyLine("subgraph db 'Storage' [ignored]")).toEqual({ kind: "laneOpen", id: "db", label: "Storage" });
    expect(classifyLine("subgraph core")).toEqual({ kind: "laneOpen", id: "core", label: "core" });
  });

  it("normalizes break markers and strips other markup in node labels", () => {
    expect(classifyLine('n1["Line one<br>Line two"]')).toEqual({ kind: "node", id: "n1", label: "Line one\nLine two" });
    expect(classifyLine('n2["A <br/> B<BR />C"]')).toEqual({ kind: "node", id: "n2", label: "A\nB\nC" });
    expect(classifyLine('n3["<b>Bold</b> text"]')).toEqual({ kind: "node", id: "n3", label: "Bold text" });
  });

  it("only closes a lane on the lowercase keyword", () => {
    expect(classifyLine("end;")).toEqual({ kind: "laneClose" });
    expect(classifyLine("END")).toEqual({ kind: "unknown" });
    expect(classifyLine("End")).toEqual({ kind: "unknown" });
  });

  it("accepts a trailing semicolon on nodes and edges", () => {
    expect(classifyLine('n1["Hello"];')).toEqual({ kind: "node", id: "n1", label: "Hello" });
    expect(classifyLine("a --> b;")).toEqual({ kind: "edge", from: "a", to: "b" });
    expect(classifyLine("a --> |go| b ;")).toEqual({ kind: "edge", from: "a", to: "b", label: "go" });
  });

  it("keeps angle-bracketed text that is not a formatting tag", () => {
    expect(classifyLine('n1["x<y and z>w"]')).toEqual({ kind: "node", id: "n1", label: "x<y and z>w" });
    expect(classifyLine('n2["List<Order>"]')).toEqual({ kind: "node", id: "n2", label: "List<Order>" });
    expect(classifyLine('n3["<span class=key>Key</span> <i>id</i>"]')).toEqual({ kind: "node", id: "n3", label: "Key id" });
  });

  it("falls back to the id when a label is empty", () => {
    expect(classifyLine('n4[""]')).toEqual({ kind: "node", id: "n4", label: "n4" });
  });

  it("drops an empty edge label", () => {
    expect(classifyLine("a --> || b")).toEqual({ kind: "edge", from: "a", to: "b" });
  });

  it("ignores inline node declarations on edge lines", () => {
    expect(classifyLine("a[One] --> b[Two]")).toEqual({ kind: "unknown" });
  });
});

describe("parseDiagram", () => {
  it("builds lanes, nodes and labeled edges in declaration order", () => {
    const parsed = parseDiagram(layered);

    expect(parsed.lanes.map((lane) => [lane.id, lane.label, lane.nodeIds])).toEqual([
      ["A", "Layer One", ["n1", "n2"]],
      ["B", "Layer Two", ["n3"]],
    ]);
    expect(parsed.nodes.map((node) => [node.id, node.label, node.laneId])).toEqual([
      ["n1", "Hello", "A"],
      ["n2", "World", "A"],
      ["n3", "Foo", "B"],
    ]);
    expect(parsed.edges).toEqual([{ from: "n1", to: "n3", label: "go" }]);
    expect(parsed.diagnostics).toEqual([]);
  });

  it("drops an edge declared before its endpoints", () => {
    const parsed = parseDiagram(`x --> y
x["X"]
y["Y"]`);

    expect(parsed.nodes.map((node) => node.id)).toEqual(["x", "y"]);
    expect(parsed.edges).toEqual([]);
    expect(parsed.diagnostics).toEqual([
      {
        line: 1,
        kind: "dangling-edge",
        severity: "error",
        message: "Edge x --> y references undeclared node x, y",
        text: "x --> y",
      },
    ]);
  });

  it("drops an edge with one undeclared endpoint", () => {
    const parsed = parseDiagram(`a["A"]
a --> ghost
a --> a`);

    expect(parsed.edges).toEqual([{ from: "a", to: "a" }]);
    expect(parsed.diagnostics.map((d) => d.message)).toEqual(["Edge a --> ghost references undeclared node ghost"]);
  });

  it("keeps the last label and the original lane for a redeclared node", () => {
    const parsed = parseDiagram(`subgraph A["Layer One"]
n1["Hello"]
end
n1["Updated"]`);

    expect(parsed.nodes).toHaveLength(1);
    expect(parsed.nodes[0]).toMatchObject({ id: "n1", label: "Updated", laneId: "A" });
    expect(parsed.lanes[0].nodeIds).toEqual(["n1"]);
    expect(parsed.diagnostics.map((d) => d.kind)).toEqual(["duplicate-node"]);
  });

  it("moves a free node into the first lane that redeclares it", () => {
    const parsed = parseDiagram(`loose["Loose"]
subgraph S["Session State"]
other["Other"]
loose["Adopted"]
end`);

    expect(parsed.lanes[0].nodeIds).toEqual(["other", "loose"]);
    expect(parsed.nodes.map((node) => node.id)).toEqual(["loose", "other"]);
    expect(parsed.nodes[0]).toMatchObject({ label: "Adopted", laneId: "S", category: "state" });
  });

  it("never puts a node in two lanes", () => {
    const parsed = parseDiagram(`subgraph A
n1[One]
end
subgraph B
n1[Again]
end`);

    expect(parsed.lanes.map((lane) => lane.nodeIds)).toEqual([["n1"], []]);
    expect(parsed.nodes[0].laneId).toBe("A");
    expect(parsed.diagnostics.map((d) => d.kind)).toEqual(["duplicate-node", "ownership-conflict"]);
  });

  it("replaces the current lane when a lane opens before the previous one closes", () => {
    const parsed = parseDiagram(`subgraph outer["Outer"]
a[A]
subgraph inner["Inner"]
b[B]
end
c[C]`);

    expect(parsed.lanes.map((lane) => [lane.id, lane.nodeIds])).toEqual([
      ["outer", ["a"]],
      ["inner", ["b"]],
    ]);
    expect(parsed.nodes.find((node) => node.id === "c")?.laneId).toBeUndefined();
    expect(parsed.diagnostics.map((d) => [d.line, d.kind])).toEqual([[3, "nested-lane"]]);
  });

  it("opens a separate lane when a lane id is reused", () => {
    const parsed = parseDiagram(`subgraph A["One"]
a[A]
end
subgraph A["Two"]
b[B]
end`);

    expect(parsed.lanes.map((lane) => [lane.id, lane.key, lane.label, lane.nodeIds])).toEqual([
      ["A", "A", "One", ["a"]],
      ["A", "A#2", "Two", ["b"]],
    ]);
    expect(parsed.nodes.map((node) => [node.id, node.laneId, node.laneKey])).toEqual([
      ["a", "A", "A"],
      ["b", "A", "A#2"],
    ]);
    expect(parsed.diagnostics.map((d) => [d.line, d.kind, d.severity])).toEqual([[4, "duplicate-lane", "warning"]]);
  });

  it("does not let a reused lane id grow the closed lane", () => {
    const parsed = parseDiagram(`subgraph A
a[A]
end
subgraph A
a[Again]
end`);

    expect(parsed.lanes.map((lane) => lane.nodeIds)).toEqual([["a"], []]);
    expect(parsed.nodes[0]).toMatchObject({ label: "Again", laneKey: "A" });
    expect(parsed.diagnostics.map((d) => d.kind)).toEqual(["duplicate-lane", "duplicate-node", "ownership-conflict"]);
  });

  it("assigns lane categories to owned nodes and default to free nodes", () => {
    const parsed = parseDiagram(`subgraph ui["Presentation Layer"]
page[Page]
end
subgraph infra["Infrastructure"]
db[Database]
end
free[Free]`);

    expect(parsed.lanes.map((lane) => lane.category)).toEqual(["presentation", "infrastructure"]);
    expect(parsed.nodes.map((node) => node.category)).toEqual(["presentation", "infrastructure", "default"]);
  });

  it("treats style directives as a no-op", () => {
    const withStyle = parseDiagram(`a[A]
style a fill:#ff0000`);
    const withoutStyle = parseDiagram("a[A]");

    expect(withStyle.nodes).toEqual(withoutStyle.nodes);
    expect(withStyle.diagnostics).toEqual([]);
  });

  it("reports unrecognized, stray and unclosed lines without failing", () => {
    const parsed = parseDiagram(`end
n1[[broken
subgraph open["Never closed"]
n2[Two]`);

    expect(parsed.nodes.map((node) => node.id)).toEqual(["n2"]);
    expect(parsed.lanes[0].nodeIds).toEqual(["n2"]);
    expect(parsed.diagnostics.map((d) => [d.line, d.kind, d.text])).toEqual([
      [1, "stray-lane-close", "end"],
      [2, "unparseable-line", "n1[[broken"],
      [3, "unclosed-lane", 'subgraph open["Never closed"]'],
    ]);
  });

  it("accepts CRLF line endings", () => {
    const parsed = parseDiagram("a[A]\r\nb[B]\r\na --> b\r\n");

    expect(parsed.nodes.map((node) => node.label)).toEqual(["A", "B"]);
    expect(parsed.edges).toEqual([{ from: "a", to: "b" }]);
  });

  it("throws every error diagnostic in strict mode", () => {
    const run = () => parseDiagram("x --> y\nnonsense here", { strict: true });

    expect(run).toThrow(DiagramParseError);
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(DiagramParseError);
      if (error instanceof DiagramParseError) {
        expect(error.diagnostics.map((d) => d.kind)).toEqual(["dangling-edge", "unparseable-line"]);
        expect(error.message).toBe(
          "Diagram source has 2 problem(s); first at line 1: Edge x --> y references undeclared node x, y",
        );
      }
    }
  });

  it("accepts resolved conflicts in strict mode", () => {
    const parsed = parseDiagram('a["A"]\na["B"]', { strict: true });

    expect(parsed.nodes).toEqual([
      { id: "a", label: "B", category: "default", x: 0, y: 0, width: 0, height: 0 },
    ]);
    expect(parsed.diagnostics.map((d) => [d.kind, d.severity])).toEqual([["duplicate-node", "warning"]]);
  });

  it("does not throw in strict mode for lane warnings", () => {
    const source = `end
subgraph A
x[X]
subgraph B
x[Y]
end
subgraph A
y[Y]`;

    const parsed = parseDiagram(source, { strict: true });
    expect(parsed.diagnostics.map((d) => d.kind)).toEqual([
      "stray-lane-close",
      "nested-lane",
      "duplicate-node",
      "ownership-conflict",
      "duplicate-lane",
      "unclosed-lane",
    ]);
    expect(parsed.diagnostics.every((d) => d.severity === "warning")).toBe(true);
  });

  it("throws only the errors in strict mode", () => {
    const run = () => parseDiagram('a["A"]\na["B"]\na --> ghost', { strict: true });

    expect(run).toThrow(DiagramParseError);
    try {
      run();
    } catch (error) {
      expect(error).toBeInstanceOf(DiagramParseError);
      if (error instanceof DiagramParseError) {
        expect(error.diagnostics.map((d) => d.kind)).toEqual(["dangling-edge"]);
      }
    }
  });

  it("does not throw in strict mode for a clean source", () => {
    expect(parseDiagram(layered, { strict: true }).edges).toHaveLength(1);
  });
});
