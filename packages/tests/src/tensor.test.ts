import { describe, it, expect } from "vitest";
import { ShapeError, BackendError } from "@gradgraph/core";
import { CpuRefBackend, backendRegistry } from "@gradgraph/tensor";

describe("CpuRefBackend", () => {
  const B = new CpuRefBackend();

  it("zeros", () => {
    const t = B.zeros([2, 3]);
    expect(t.shape).toEqual([2, 3]);
    expect(t.dtype).toBe("f64");
    expect(Array.from(t.data)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("scalar is 0-dimensional", () => {
    const s = B.scalar(5);
    expect(s.shape).toEqual([]);
    expect(s.data.length).toBe(1);
    expect(B.item(s)).toBe(5);
  });

  it("fromArray rejects a length that does not match the shape", () => {
    expect(() => B.fromArray([1, 2, 3], [2, 2])).toThrow(ShapeError);
  });

  it("add / sub / mul", () => {
    const a = B.fromArray([1, 2, 3], [3]);
    const b = B.fromArray([4, 5, 7], [3]);
    expect(Array.from(B.add(a, b).data)).toEqual([5, 7, 10]);
    expect(Array.from(B.sub(a, b).data)).toEqual([-3, -3, -4]);
    expect(Array.from(B.mul(a, b).data)).toEqual([4, 10, 21]);
  });

  it("does not broadcast", () => {
    const a = B.fromArray([1, 2, 3], [3]);
    const b = B.fromArray([1, 2], [2]);
    expect(() => B.add(a, b)).toThrow(ShapeError);
    expect(() => B.add(a, B.scalar(1))).toThrow("add: shape mismatch, expected [3] but got []");
  });

  it("sum and dot return scalars", () => {
    const a = B.fromArray([1, 2, 3], [3]);
    const b = B.fromArray([4, 5, 6], [3]);
    expect(B.sum(a).shape).toEqual([]);
    expect(B.item(B.sum(a))).toBe(6);
    expect(B.item(B.dot(a, b))).toBe(32);
  });

  it("matvec", () => {
    // [[1,2,3],[4,5,6]] · [1,0,-1] = [-2,-2]
    const m = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const v = B.fromArray([1, 0, -1], [3]);
    const r = B.matvec(m, v);
    expect(r.shape).toEqual([2]);
    expect(Array.from(r.data)).toEqual([-2, -2]);
    expect(() => B.matvec(m, B.fromArray([1, 2], [2]))).toThrow(ShapeError);
  });

  it("transpose", () => {
    const m = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const t = B.transpose(m);
    expect(t.shape).toEqual([3, 2]);
    expect(Array.from(t.data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("outer", () => {
    const o = B.outer(B.fromArray([1, 2], [2]), B.fromArray([3, 4, 5], [3]));
    expect(o.shape).toEqual([2, 3]);
    expect(Array.from(o.data)).toEqual([3, 4, 5, 6, 8, 10]);
  });

  it("tanh and square", () => {
    const a = B.fromArray([0, 1, -2], [3]);
    expect(Array.from(B.square(a).data)).toEqual([0, 1, 4]);
    const t = B.tanh(a).data;
    expect(t[0]).toBe(0);
    expect(t[1]).toBeCloseTo(0.761594, 5);
    expect(t[2]).toBeCloseTo(-0.964028, 5);
  });

  it("addInplace accumulates into the target", () => {
    const acc = B.zeros([2]);
    B.addInplace(acc, B.fromArray([1, 2], [2]));
    B.addInplace(acc, B.fromArray([10, 20], [2]));
    expect(Array.from(acc.data)).toEqual([11, 22]);
    expect(() => B.addInplace(acc, B.zeros([3]))).toThrow(ShapeError);
  });

  it("clone does not share storage", () => {
    const a = B.fromArray([1, 2], [2]);
    const c = B.clone(a);
    c.data[0] = 9;
    expect(a.data[0]).toBe(1);
  });

  it("item rejects multi-element tensors", () => {
    expect(() => B.item(B.zeros([2]))).toThrow(ShapeError);
  });

  it("equal and allClose compare shape and values", () => {
    const a = B.fromArray([1, 2], [2]);
    expect(B.equal(a, B.fromArray([1, 2], [2]))).toBe(true);
    expect(B.equal(a, B.fromArray([1, 2], [1, 2]))).toBe(false);
    expect(B.allClose(a, B.fromArray([1 + 1e-10, 2], [2]))).toBe(true);
    expect(B.allClose(a, B.fromArray([1.1, 2], [2]))).toBe(false);
  });

  it("f32 backend allocates Float32Array storage", () => {
    const t = new CpuRefBackend("f32").ones([2]);
    expect(t.dtype).toBe("f32");
    expect(t.data).toBeInstanceOf(Float32Array);
  });
});

describe("backendRegistry", () => {
  it("creates cpu_ref with the requested dtype", () => {
    const B = backendRegistry.get("cpu_ref", "f32");
    expect(B.name).toBe("cpu_ref");
    expect(B.dtype).toBe("f32");
    expect(backendRegistry.list()).toEqual(["cpu_ref"]);
  });

  it("unknown names fail with BackendError", () => {
    expect(() => backendRegistry.get("webgpu", "f64")).toThrow(BackendError);
  });
});
