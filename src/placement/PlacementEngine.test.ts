import {
  computeCells,
  computePopupSize,
  GRID_CELL_SIDE,
  place,
  placeLowkey,
  siblingWeight,
} from "./PlacementEngine";
import type { PlacementRequest } from "./PlacementEngine";
import { containsRect, intersectionArea } from "../geometry/Rect";
import { createSeededRandom, randomInt } from "../random/Random";
import type { Monitor, Rectangle } from "../types";

const FULL_HD: Monitor = { x: 0, y: 0, width: 1920, height: 1080 };
const constant = (value: number) => () => value;

function request(overrides: Partial<PlacementRequest>): PlacementRequest {
  return {
    size: { width: 400, height: 300 },
    monitor: FULL_HD,
    siblings: [],
    popupIndex: 1,
    lowkeyMode: false,
    lowkeyCorner: 0,
    ...overrides,
  };
}

describe("PlacementEngine", () => {
  describe("computePopupSize", () => {
    it("scales the longer side to the drawn share of the monitor's shorter side", () => {
      // randomInt(30, 70) with 0.5 → 50%
      const size = computePopupSize({ width: 1080, height: 540 }, FULL_HD, false, constant(0.5));
      expect(size).toEqual({ width: 540, height: 270 });
    });

    it("uses the smaller range in lowkey mode", () => {
      // randomInt(20, 50) with 0 → 20%
      const size = computePopupSize({ width: 1080, height: 540 }, FULL_HD, true, constant(0));
      expect(size).toEqual({ width: 216, height: 108 });
    });

    it("keeps results within the configured share for any draw", () => {
      const rng = createSeededRandom(11);
      for (let i = 0; i < 200; i++) {
        const size = computePopupSize({ width: 640, height: 480 }, FULL_HD, false, rng);
        expect(size.width).toBeGreaterThanOrEqual(Math.floor(1080 * 0.3) - 1);
        expect(size.width).toBeLessThanOrEqual(Math.ceil(1080 * 0.7));
        expect(Math.abs(size.width / size.height - 640 / 480)).toBeLessThan(0.02);
      }
    });

    it("never returns an empty size", () => {
      const size = computePopupSize({ width: 100000, height: 1 }, FULL_HD, true, constant(0));
      expect(size.height).toBe(1);
    });
  });

  describe("lowkey placement", () => {
    it("anchors corner 1 at the top-right on every call", () => {
      for (let i = 0; i < 10; i++) {
        const rect = place(
          request({ size: { width: 300, height: 200 }, lowkeyMode: true, lowkeyCorner: 1 }),
          Math.random,
        );
        expect(rect).toEqual({ x: 1620, y: 0, width: 300, height: 200 });
      }
    });

    it("anchors the other fixed corners", () => {
      const size = { width: 300, height: 200 };
      const rng = constant(0.5);
      expect(placeLowkey(size, FULL_HD, 0, rng)).toEqual({ x: 0, y: 0, width: 300, height: 200 });
      expect(placeLowkey(size, FULL_HD, 2, rng)).toEqual({ x: 0, y: 880, width: 300, height: 200 });
      expect(placeLowkey(size, FULL_HD, 3, rng)).toEqual({ x: 1620, y: 880, width: 300, height: 200 });
    });

    it("offsets by the monitor origin", () => {
      const second: Monitor = { x: 1920, y: -100, width: 1280, height: 1024 };
      expect(placeLowkey({ width: 300, height: 200 }, second, 3, constant(0))).toEqual({
        x: 1920 + 980,
        y: -100 + 824,
        width: 300,
        height: 200,
      });
    });

    it("resolves corner 4 to a random fixed corner", () => {
      // randomInt(0, 3) with 0.99 → 3 (bottom-right)
      expect(placeLowkey({ width: 300, height: 200 }, FULL_HD, 4, constant(0.99))).toEqual({
        x: 1620,
        y: 880,
        width: 300,
        height: 200,
      });
      // randomInt(0, 3) with 0 → 0 (top-left)
      expect(placeLowkey({ width: 300, height: 200 }, FULL_HD, 4, constant(0))).toEqual({
        x: 0,
        y: 0,
        width: 300,
        height: 200,
      });
    });
  });

  describe("computeCells", () => {
    it("covers the valid area with fixed-size cells", () => {
      const cells = computeCells({ width: 500, height: 400 }, { x: 0, y: 0, width: 1000, height: 700 }, [], 1);
      expect(cells).toHaveLength(10 * 6);
      expect(cells.every((c) => c.weight === 1)).toBe(true);
    });

    it("extends the last cell on each axis over the remainder", () => {
      // Area 120 x 100 → 2 x 2 cells
      const cells = computeCells({ width: 880, height: 900 }, { x: 0, y: 0, width: 1000, height: 1000 }, [], 1);
      expect(cells).toHaveLength(4);
      const last = cells.find((c) => c.col === 1 && c.row === 1);
      expect(last).toMatchObject({ minX: 50, maxX: 119, minY: 50, maxY: 99 });
      const first = cells.find((c) => c.col === 0 && c.row === 0);
      expect(first).toMatchObject({ minX: 0, maxX: 49, minY: 0, maxY: 49 });
    });

    it("keeps a single cell when the area is smaller than one cell", () => {
      const cells = computeCells({ width: 100, height: 90 }, { x: 0, y: 0, width: 120, height: 100 }, [], 1);
      expect(cells).toHaveLength(1);
      expect(cells[0]).toMatchObject({ minX: 0, maxX: 19, minY: 0, maxY: 9 });
    });

    it("keeps a single zero-span cell when the popup fills the monitor", () => {
      const cells = computeCells({ width: 1920, height: 1080 }, FULL_HD, [], 1);
      expect(cells).toHaveLength(1);
      expect(cells[0]).toMatchObject({ minX: 0, maxX: 0, minY: 0, maxY: 0 });
    });

    it("ignores siblings for the first popup", () => {
      const sibling = { x: 0, y: 0, width: 400, height: 300 };
      const cells = computeCells({ width: 400, height: 300 }, FULL_HD, [sibling], 1);
      expect(cells.every((c) => c.weight === 1)).toBe(true);
    });

    it("prefers cells farther from a sibling covering the valid area", () => {
      const monitor: Monitor = { x: 0, y: 0, width: 1000, height: 1000 };
      const sibling: Rectangle = { x: 250, y: 250, width: 500, height: 500 };
      const cells = computeCells({ width: 500, height: 500 }, monitor, [sibling], 2);
      const diagonal = [0, 1, 2, 3, 4, 5].map((i) => {
        const cell = cells.find((c) => c.col === i && c.row === i);
        if (!cell) throw new Error(`missing cell ${i}`);
        return cell.weight;
      });

      for (let i = 0; i < diagonal.length - 1; i++) {
        expect(diagonal[i]).toBeGreaterThan(diagonal[i + 1]);
      }
      // Fully overlapping, same center: 2^0 + 0
      expect(diagonal[5]).toBe(1);
    });

    it("scores a cell by its worst sibling, not a sum", () => {
      const size = { width: 100, height: 100 };
      const monitor: Monitor = { x: 0, y: 0, width: 150, height: 100 };
      const overlapping = { x: 0, y: 0, width: 100, height: 100 };
      const far = { x: 5000, y: 5000, width: 10, height: 10 };
      const cells = computeCells(size, monitor, [far, overlapping], 3);
      expect(cells).toHaveLength(1);
      expect(cells[0].weight).toBe(1);
    });

    it("honours a custom cell side and bias", () => {
      const cells = computeCells(
        { width: 100, height: 100 },
        { x: 0, y: 0, width: 300, height: 200 },
        [{ x: 1000, y: 1000, width: 100, height: 100 }],
        2,
        { cellSide: 100, overlapBias: 4 },
      );
      expect(cells).toHaveLength(2);
      // Clear of the sibling: 2^4 + distance²
      const first = cells[0];
      const expected = 16 + (50 - 1050) ** 2 + (50 - 1050) ** 2;
      expect(first.weight).toBe(expected);
    });
  });

  describe("siblingWeight", () => {
    it("grows with distance between clear rectangles", () => {
      const candidate = { x: 0, y: 0, width: 100, height: 100 };
      const near = siblingWeight(candidate, { x: 200, y: 0, width: 100, height: 100 });
      const far = siblingWeight(candidate, { x: 900, y: 0, width: 100, height: 100 });
      expect(far).toBeGreaterThan(near);
      expect(near).toBe(2 ** 32 + 200 * 200);
    });

    it("collapses as overlap approaches total", () => {
      const candidate = { x: 0, y: 0, width: 100, height: 100 };
      const half = siblingWeight(candidate, { x: 50, y: 0, width: 100, height: 100 });
      expect(half).toBe(2 ** 16 + 50 * 50);
    });

    it("stays finite and ordered under a very large bias", () => {
      const candidate = { x: 0, y: 0, width: 100, height: 100 };
      const clear = siblingWeight(candidate, { x: 200, y: 0, width: 100, height: 100 }, 2000);
      const half = siblingWeight(candidate, { x: 50, y: 0, width: 100, height: 100 }, 2000);
      expect(clear).toBe(2 ** 1000);
      expect(half).toBe(1);
    });
  });

  describe("place", () => {
    it("stays inside the monitor for any popup no larger than it", () => {
      const rng = createSeededRandom(2024);
      for (let i = 0; i < 300; i++) {
        const monitor: Monitor = {
          x: randomInt(rng, -2000, 2000),
          y: randomInt(rng, -1000, 1000),
          width: randomInt(rng, 200, 3000),
          height: randomInt(rng, 200, 2000),
        };
        const size = { width: randomInt(rng, 1, monitor.width), height: randomInt(rng, 1, monitor.height) };
        const siblings: Rectangle[] = [];
        const siblingCount = randomInt(rng, 0, 4);
        for (let s = 0; s < siblingCount; s++) {
          siblings.push({
            x: monitor.x + randomInt(rng, 0, monitor.width - size.width),
            y: monitor.y + randomInt(rng, 0, monitor.height - size.height),
            width: size.width,
            height: size.height,
          });
        }

        const rect = place(request({ size, monitor, siblings, popupIndex: siblingCount + 1 }), rng);
        expect(containsRect(monitor, rect)).toBe(true);
        expect(rect.width).toBe(size.width);
        expect(rect.height).toBe(size.height);
      }
    });

    it("clamps a popup larger than its monitor", () => {
      const monitor: Monitor = { x: 10, y: 20, width: 1920, height: 1080 };
      const rect = place(request({ size: { width: 3000, height: 2000 }, monitor }), createSeededRandom(1));
      expect(rect).toEqual({ x: 10, y: 20, width: 1920, height: 1080 });
    });

    it("spreads the first popup uniformly over the grid", () => {
      const monitor: Monitor = { x: 0, y: 0, width: 1000, height: 700 };
      const size = { width: 500, height: 400 }; // 10 x 6 cells of 50px
      const cols = 10;
      const rows = 6;
      const samples = 6000;
      const counts = new Array<number>(cols * rows).fill(0);
      const rng = createSeededRandom(77);

      for (let i = 0; i < samples; i++) {
        const rect = place(request({ size, monitor }), rng);
        const col = Math.min(cols - 1, Math.floor(rect.x / GRID_CELL_SIDE));
        const row = Math.min(rows - 1, Math.floor(rect.y / GRID_CELL_SIDE));
        counts[col * rows + row]++;
      }

      const expected = samples / (cols * rows);
      const chiSquare = counts.reduce((sum, observed) => sum + (observed - expected) ** 2 / expected, 0);
      // 59 degrees of freedom; 100 is beyond the 0.1% critical value
      expect(chiSquare).toBeLessThan(100);
    });

    it("keeps clear of a sibling under a very large bias", () => {
      const rng = createSeededRandom(19);
      const sibling = { x: 0, y: 0, width: 400, height: 300 };
      let overlaps = 0;
      for (let i = 0; i < 200; i++) {
        const rect = place(request({ siblings: [sibling], popupIndex: 2 }), rng, {
          cellSide: GRID_CELL_SIDE,
          overlapBias: 2000,
        });
        if (intersectionArea(rect, sibling) > 0) overlaps++;
      }
      expect(overlaps).toBe(0);
    });

    it("fills the open quadrant when the other three are taken", () => {
      const siblings: Rectangle[] = [
        { x: 0, y: 0, width: 960, height: 540 },
        { x: 960, y: 0, width: 960, height: 540 },
        { x: 0, y: 540, width: 960, height: 540 },
      ];
      const rng = createSeededRandom(5);
      const trials = 200;
      let openQuadrant = 0;

      for (let i = 0; i < trials; i++) {
        const rect = place(request({ siblings, popupIndex: 4 }), rng);
        const cx = rect.x + rect.width / 2;
        const cy = rect.y + rect.height / 2;
        if (cx >= 960 && cy >= 540) openQuadrant++;
      }

      expect(openQuadrant).toBeGreaterThanOrEqual(190);
    });
  });
});
