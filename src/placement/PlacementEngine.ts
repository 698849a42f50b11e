import type { LowkeyCorner, Monitor, Rectangle, Size } from "../types";
import { RANDOM_CORNER } from "../types";
import { centerDistanceSquared, intersectionArea } from "../geometry/Rect";
import type { RandomSource } from "../random/Random";
import { randomInt, weightedIndex } from "../random/Random";

/** Side of one square grid cell, in pixels. */
export const GRID_CELL_SIDE = 50;

/**
 * Exponent scale applied to the non-overlapping fraction of a candidate.
 * 2^32 for a fully clear candidate dwarfs any squared center distance on a
 * real display, so overlap decides first and distance only breaks ties.
 */
export const OVERLAP_BIAS = 32;

// Largest exponent kept before weights are rescaled to stay finite
const MAX_WEIGHT_EXPONENT = 1000;

const SIZE_PERCENT_NORMAL: [number, number] = [30, 70];
const SIZE_PERCENT_LOWKEY: [number, number] = [20, 50];

export interface PlacementOptions {
  cellSide: number;
  overlapBias: number;
}

export const DEFAULT_PLACEMENT_OPTIONS: PlacementOptions = {
  cellSide: GRID_CELL_SIDE,
  overlapBias: OVERLAP_BIAS,
};

export interface PlacementRequest {
  size: Size;
  monitor: Monitor;
  /** Rectangles of every other live popup. */
  siblings: readonly Rectangle[];
  /** Live popup count, including the popup being placed. */
  popupIndex: number;
  lowkeyMode: boolean;
  lowkeyCorner: LowkeyCorner;
}

/** One candidate cell of the placement grid, relative to the monitor. */
export interface PlacementCell {
  col: number;
  row: number;
  /** Inclusive range of x offsets this cell can yield. */
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
  weight: number;
}

/**
 * Scale a source image so its longer side covers a random share of the
 * monitor's shorter side, preserving aspect ratio.
 */
export function computePopupSize(
  source: Size,
  monitor: Monitor,
  lowkeyMode: boolean,
  rng: RandomSource,
): Size {
  const sourceScale = Math.max(source.width, source.height) / Math.min(monitor.width, monitor.height);
  const [lo, hi] = lowkeyMode ? SIZE_PERCENT_LOWKEY : SIZE_PERCENT_NORMAL;
  const target = randomInt(rng, lo, hi) / 100;
  const scale = sourceScale > 0 ? target / sourceScale : 0;

  return {
    width: Math.max(1, Math.floor(source.width * scale)),
    height: Math.max(1, Math.floor(source.height * scale)),
  };
}

/**
 * Weight of placing `candidate` given a single sibling. Lower means worse.
 *
 * Biases above MAX_WEIGHT_EXPONENT scale every weight by the same power of
 * two, so ratios between cells are kept and clear cells stay finite.
 */
export function siblingWeight(candidate: Rectangle, sibling: Rectangle, overlapBias = OVERLAP_BIAS): number {
  const area = candidate.width * candidate.height;
  const nonoverlap = area > 0 ? 1 - intersectionArea(candidate, sibling) / area : 1;
  const shift = Math.max(0, overlapBias - MAX_WEIGHT_EXPONENT);
  return (
    Math.pow(2, overlapBias * nonoverlap - shift) +
    centerDistanceSquared(candidate, sibling) * Math.pow(2, -shift)
  );
}

/**
 * Build the placement grid over the valid area and weight every cell.
 * A cell is only as good as its worst sibling conflict, so the weight is
 * the minimum across siblings rather than a sum.
 */
export function computeCells(
  size: Size,
  monitor: Monitor,
  siblings: readonly Rectangle[],
  popupIndex: number,
  options: PlacementOptions = DEFAULT_PLACEMENT_OPTIONS,
): PlacementCell[] {
  const side = options.cellSide;
  const areaWidth = Math.max(0, monitor.width - size.width);
  const areaHeight = Math.max(0, monitor.height - size.height);
  const cols = Math.max(1, Math.floor(areaWidth / side));
  const rows = Math.max(1, Math.floor(areaHeight / side));
  const uniform = popupIndex <= 1 || siblings.length === 0;

  const cells: PlacementCell[] = [];
  for (let col = 0; col < cols; col++) {
    const minX = col * side;
    // Last column absorbs whatever the area does not divide into
    const maxX = col === cols - 1 ? Math.max(minX, areaWidth - 1) : minX + side - 1;

    for (let row = 0; row < rows; row++) {
      const minY = row * side;
      const maxY = row === rows - 1 ? Math.max(minY, areaHeight - 1) : minY + side - 1;

      let weight = 1;
      if (!uniform) {
        const candidate: Rectangle = {
          x: monitor.x + minX,
          y: monitor.y + minY,
          width: size.width,
          height: size.height,
        };
        weight = Infinity;
        for (const sibling of siblings) {
          weight = Math.min(weight, siblingWeight(candidate, sibling, options.overlapBias));
        }
      }

      cells.push({ col, row, minX, maxX, minY, maxY, weight });
    }
  }
  return cells;
}

/**
 * Anchor a popup in one corner of its monitor.
 */
export function placeLowkey(size: Size, monitor: Monitor, corner: LowkeyCorner, rng: RandomSource): Rectangle {
  const resolved = corner === RANDOM_CORNER ? randomInt(rng, 0, 3) : corner;
  const right = resolved === 1 || resolved === 3;
  const bottom = resolved === 2 || resolved === 3;

  return {
    x: monitor.x + (right ? monitor.width - size.width : 0),
    y: monitor.y + (bottom ? monitor.height - size.height : 0),
    width: size.width,
    height: size.height,
  };
}

/**
 * Choose a rectangle for a new popup on its monitor.
 *
 * Lowkey mode anchors to a corner. Otherwise the valid area is split into
 * a grid, each cell is weighted against the live siblings, one cell is
 * sampled by weight and a pixel inside it is picked uniformly.
 */
export function place(
  request: PlacementRequest,
  rng: RandomSource,
  options: PlacementOptions = DEFAULT_PLACEMENT_OPTIONS,
): Rectangle {
  const { monitor } = request;
  const size: Size = {
    width: Math.min(request.size.width, monitor.width),
    height: Math.min(request.size.height, monitor.height),
  };

  if (request.lowkeyMode) {
    return placeLowkey(size, monitor, request.lowkeyCorner, rng);
  }

  const cells = computeCells(size, monitor, request.siblings, request.popupIndex, options);
  const cell = cells[weightedIndex(rng, cells.map((c) => c.weight))];

  return {
    x: monitor.x + randomInt(rng, cell.minX, cell.maxX),
    y: monitor.y + randomInt(rng, cell.minY, cell.maxY),
    width: size.width,
    height: size.height,
  };
}
