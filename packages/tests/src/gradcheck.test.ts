import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { GraphError, defaultGraphConfig } from "@gradgraph/core";
import { CpuRefBackend } from "@gradgraph/tensor";
import { Leaf, SquaredL2Distance, Graph, gradCheck } from "@gradgraph/autograd";
import { loadConfig } from "@gradgraph/effect-runtime";
import { buildNetwork, values, thrown } from "./helpers.js";

describe("gradCheck", () => {
  const B = new CpuRefBackend();

  it("analytic gradients match central differences for every node", () => {
    const { graph } = buildNetwork(B);
    const report = gradCheck(graph);

    // every entry of every non-output node: W 6, x 3, b1 2, h 2, a 2, v 2, c/y/target/err/reg 1 each
    expect(report.entries).toHaveLength(22);
    expect(report.ok).toBe(true);
    expect(report.maxError).toBeLessThan(1e-6);
    for (const e of report.entries) {
      expect(e.analytic).toBeCloseTo(e.numeric, 6);
    }
  });

  it("checks only the requested nodes", () => {
    const { graph } = buildNetwork(B);
    const report = gradCheck(graph, { nodes: ["W", "a"] });
    expect(report.entries.map((e) => `${e.node}:${e.index}`)).toEqual([
      "W:0", "W:1", "W:2", "W:3", "W:4", "W:5", "a:0", "a:1",
    ]);
    expect(report.ok).toBe(true);
  });

  it("a checked node does not leave stale values for the next one", () => {
    const { graph } = buildNetwork(B);
    const alone = gradCheck(graph, { nodes: ["y"], eps: 1e-4 });
    const after = gradCheck(graph, { nodes: ["c", "y"], eps: 1e-4 });

    const y = after.entries.find((e) => e.node === "y");
    expect(y?.error).toBeLessThan(1e-8);
    expect(y?.analytic).toBe(alone.entries[0].analytic);
    expect(y?.numeric).toBeCloseTo(alone.entries[0].numeric, 8);
  });

  it("takes eps and tolerances from config, options winning", () => {
    const { graph } = buildNetwork(B);
    const strict = Effect.runSync(loadConfig({}, {
      GRADGRAPH_GRADCHECK_EPS: "0.1",
      GRADGRAPH_GRADCHECK_ATOL: "0",
      GRADGRAPH_GRADCHECK_RTOL: "0",
    }));

    expect(gradCheck(graph).ok).toBe(true);
    expect(gradCheck(graph, {}, strict).ok).toBe(false);
    expect(gradCheck(graph, { atol: 1 }, strict).ok).toBe(true);
  });

  it("squared distance gradients for a=[1,2,3], b=[4,5,7] agree with differences", () => {
    const a = new Leaf("a", B.fromArray([1, 2, 3], [3]));
    const b = new Leaf("b", B.fromArray([4, 5, 7], [3]));
    const graph = new Graph(new SquaredL2Distance("d", a, b), { backend: B });
    const report = gradCheck(graph, {
      eps: defaultGraphConfig.gradCheckEps,
      atol: defaultGraphConfig.gradCheckAtol,
      rtol: defaultGraphConfig.gradCheckRtol,
    });

    expect(report.entries.map((e) => e.analytic)).toEqual([-6, -6, -8, 6, 6, 8]);
    for (const e of report.entries) {
      expect(e.numeric).toBeCloseTo(e.analytic, 6);
    }
  });

  it("leaves the graph as a clean run would", () => {
    const { graph, W } = buildNetwork(B);
    const expected = graph.run();
    const original = W.out;
    gradCheck(graph);

    expect(W.out).toBe(original);
    expect(graph.backend.item(graph.value())).toBe(expected.value);
    for (const [name, g] of expected.gradients) {
      expect(values(graph.gradient(name))).toEqual(values(g));
    }
  });

  it("unknown node names fail", () => {
    const { graph } = buildNetwork(B);
    const err = thrown(() => gradCheck(graph, { nodes: ["nope"] }));
    expect(err).toBeInstanceOf(GraphError);
    expect(err).toMatchObject({ kind: "unknown-node", node: "nope" });
  });
});
