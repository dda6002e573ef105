import { describe, it, expect } from "vitest";
import { BoundedHeap } from "../boundedHeap";

const higher = (a: number, b: number) => a > b;

describe("BoundedHeap", () => {
  it("keeps only the best items up to capacity", () => {
    const heap = new BoundedHeap<number>(3, higher);
    for (const value of [5, 1, 9, 3, 7, 2, 8]) heap.offer(value);

    expect(heap.size).toBe(3);
    expect(heap.sorted()).toEqual([9, 8, 7]);
  });

  it("reports whether an offer was retained", () => {
    const heap = new BoundedHeap<number>(2, higher);
    expect(heap.offer(4)).toBe(true);
    expect(heap.offer(6)).toBe(true);
    expect(heap.offer(3)).toBe(false);
    expect(heap.offer(5)).toBe(true);
    expect(heap.sorted()).toEqual([6, 5]);
  });

  it("does not replace the weakest item on a tie", () => {
    const heap = new BoundedHeap<{ score: number; id: string }>(1, (a, b) => a.score > b.score);
    heap.offer({ score: 1, id: "first" });
    heap.offer({ score: 1, id: "second" });
    expect(heap.sorted()).toEqual([{ score: 1, id: "first" }]);
  });

  it("holds fewer items than capacity when fewer were offered", () => {
    const heap = new BoundedHeap<number>(10, higher);
    heap.offer(2);
    heap.offer(1);
    expect(heap.sorted()).toEqual([2, 1]);
  });

  it("retains nothing at zero capacity", () => {
    const heap = new BoundedHeap<number>(0, higher);
    expect(heap.offer(1)).toBe(false);
    expect(heap.size).toBe(0);
  });

  it("sorted() leaves the heap intact", () => {
    const heap = new BoundedHeap<number>(2, higher);
    heap.offer(1);
    heap.offer(2);
    heap.sorted();
    expect(heap.offer(0)).toBe(false);
    expect(heap.sorted()).toEqual([2, 1]);
  });
});
