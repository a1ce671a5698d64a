import { describe, expect, it } from "vitest";

import {
  clampScroll,
  computeChartLayout,
  percentile75,
  scrollbarGeometry,
  smartScale,
  stackSegments,
} from "./chart-layout";

describe("computeChartLayout", () => {
  it("returns null when not even one bar fits", () => {
    expect(computeChartLayout(10, 3, 0)).toBeNull();
    expect(computeChartLayout(0, 60, 0)).toBeNull();
  });

  it("shows every bar when they fit and clamps the scroll offset", () => {
    expect(computeChartLayout(10, 60, 999)).toEqual({
      startIndex: 0,
      visibleCount: 10,
      barWidth: 5,
      spacing: 1,
      offset: 0,
    });
  });

  it("drops bars until the rest fit and keeps the scroll inside bounds", () => {
    expect(computeChartLayout(30, 60, 999)).toEqual({
      startIndex: 20,
      visibleCount: 10,
      barWidth: 5,
      spacing: 1,
      offset: 0,
    });
  });

  it("widens bars up to the maximum and centers them", () => {
    expect(computeChartLayout(3, 60, 0)).toMatchObject({ barWidth: 19, offset: 0 });
    expect(computeChartLayout(2, 100, 0)).toMatchObject({ barWidth: 20, offset: 29 });
  });
});

describe("clampScroll", () => {
  it("keeps the offset between zero and the last page", () => {
    expect(clampScroll(5, 3, 10, 4)).toBe(6);
    expect(clampScroll(Number.MAX_SAFE_INTEGER, -1, 10, 4)).toBe(5);
    expect(clampScroll(0, -1, 10, 4)).toBe(0);
    expect(clampScroll(0, 1, 3, 4)).toBe(0);
  });
});

describe("smartScale", () => {
  it("compresses the scale around an outlier", () => {
    expect(percentile75([10, 10, 10, 10, 100])).toBe(10);
    expect(smartScale([10, 10, 10, 10, 100])).toEqual({
      actualMax: 100,
      displayMax: 20,
      compressed: true,
    });
  });

  it("keeps the actual maximum otherwise", () => {
    expect(smartScale([1, 2, 3])).toEqual({ actualMax: 3, displayMax: 3, compressed: false });
    expect(smartScale([])).toEqual({ actualMax: 0, displayMax: 0, compressed: false });
  });
});

describe("stackSegments", () => {
  it("splits the bar height in proportion", () => {
    const bar = stackSegments(
      [
        { category: "a", value: 10 },
        { category: "b", value: 10 },
      ],
      20,
      10,
    );

    expect(bar.segments.map((segment) => segment.height)).toEqual([5, 5]);
    expect(bar.capped).toBe(false);
    expect(bar.usedHeight).toBe(10);
  });

  it("caps a bar taller than the display maximum", () => {
    const bar = stackSegments([{ category: "a", value: 100 }], 20, 10);

    expect(bar.capped).toBe(true);
    expect(bar.usedHeight).toBe(10);
  });

  it("gives tiny segments one row without overflowing", () => {
    const bar = stackSegments(
      [
        { category: "a", value: 0.1 },
        { category: "b", value: 19.9 },
      ],
      20,
      10,
    );

    expect(bar.segments.map((segment) => segment.height)).toEqual([1, 9]);
    expect(bar.usedHeight).toBe(10);
  });

  it("draws nothing without height", () => {
    expect(stackSegments([{ category: "a", value: 5 }], 5, 0).segments).toEqual([]);
  });
});

describe("scrollbarGeometry", () => {
  it("places the thumb by the scroll position", () => {
    expect(scrollbarGeometry(30, 10, 20, 60)).toEqual({
      thumbStart: 40,
      thumbLength: 20,
      trackLength: 60,
    });
  });

  it("is hidden when every bar is visible", () => {
    expect(scrollbarGeometry(10, 10, 0, 60)).toBeNull();
  });
});
