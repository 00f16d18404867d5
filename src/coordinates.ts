/**
 * Coordinate resolution between the oracle's image space and device pixels,
 * plus the tap-target heuristics used before dispatching a click.
 */

import { boundsArea, centerOf, isPointInside, nodeLabel } from "./snapshot-parser.js";
import type { ClickBoxTuning, ModelTuning, SnapTuning } from "./tuning.js";
import type { Bounds, Point, ScreenSize, UINode } from "./types.js";

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Resolution the vision model actually sees for a given device screen.
 * Both sides become multiples of `factor` and the pixel count is kept within
 * [minPixels, maxPixels].
 */
export function smartResize(
  height: number,
  width: number,
  options: Pick<ModelTuning, "factor" | "minPixels" | "maxPixels">,
): ScreenSize {
  const { factor, minPixels, maxPixels } = options;
  let hBar = Math.max(factor, Math.round(height / factor) * factor);
  let wBar = Math.max(factor, Math.round(width / factor) * factor);
  if (hBar * wBar > maxPixels) {
    const beta = Math.sqrt((height * width) / maxPixels);
    hBar = Math.max(factor, Math.floor(height / beta / factor) * factor);
    wBar = Math.max(factor, Math.floor(width / beta / factor) * factor);
  } else if (hBar * wBar < minPixels) {
    const beta = Math.sqrt(minPixels / (height * width));
    hBar = Math.ceil((height * beta) / factor) * factor;
    wBar = Math.ceil((width * beta) / factor) * factor;
  }
  return { width: wBar, height: hBar };
}

/** Model-space dimensions for a screen under the configured coordinate space. */
export function modelSpaceFor(screen: ScreenSize, model: ModelTuning): ScreenSize {
  if (model.coordinateSpace === "device") return { ...screen };
  return smartResize(screen.height, screen.width, model);
}

/**
 * Maps a model-space point to device pixels. Points outside the model frame are
 * taken as already being device pixels. The result is rounded and clamped to
 * the screen.
 */
export function normalizePoint(point: Point, device: ScreenSize, model: ScreenSize): Point {
  const [x, y] = point;
  const inModelFrame =
    model.width > 0 && model.height > 0 && x >= 0 && x <= model.width && y >= 0 && y <= model.height;
  const nx = inModelFrame ? (x / model.width) * device.width : x;
  const ny = inModelFrame ? (y / model.height) * device.height : y;
  return [
    clamp(Math.round(nx), 0, Math.max(0, device.width - 1)),
    clamp(Math.round(ny), 0, Math.max(0, device.height - 1)),
  ];
}

function distance(a: Point, b: Point): number {
  return Math.hypot(a[0] - b[0], a[1] - b[1]);
}

function simpleClassName(className: string): string {
  const dot = className.lastIndexOf(".");
  return (dot >= 0 ? className.slice(dot + 1) : className).toLowerCase();
}

export function isInteractiveLooking(node: UINode, classHints: readonly string[]): boolean {
  if (boundsArea(node.bounds) <= 0) return false;
  if (node.clickable || node.resourceId || node.contentDesc || node.text) return true;
  const simple = simpleClassName(node.className);
  return classHints.some((hint) => simple.includes(hint));
}

/**
 * Moves an approximate tap onto the most plausible tappable element.
 *
 * A point already inside candidates snaps to the smallest one's center.
 * Otherwise candidates within `maxDistPx` are scored by distance, discounted
 * for being clickable, matching a preferred keyword or sitting in the right
 * rail. With no candidate in reach the point is returned unchanged.
 */
export function snapToTappable(
  point: Point,
  nodes: readonly UINode[],
  screen: ScreenSize,
  options: SnapTuning,
): Point {
  const candidates = nodes.filter((node) => isInteractiveLooking(node, options.interactiveClassHints));
  if (candidates.length === 0) return point;

  const containing = candidates.filter((node) => isPointInside(point, node.bounds));
  if (containing.length > 0) {
    const smallest = containing.reduce((best, node) => {
      const area = boundsArea(node.bounds);
      const bestArea = boundsArea(best.bounds);
      if (area !== bestArea) return area < bestArea ? node : best;
      if (node.clickable !== best.clickable) return node.clickable ? node : best;
      return node.index > best.index ? node : best;
    });
    return centerOf(smallest.bounds);
  }

  const railStart = Math.floor(screen.width * (1 - options.rightRailRatio));
  const keywords = options.preferKeywords.map((k) => k.toLowerCase());
  let best: { node: UINode; score: number } | null = null;

  for (const node of candidates) {
    const d = distance(centerOf(node.bounds), point);
    if (d > options.maxDistPx) continue;
    let score = d;
    if (node.clickable) score *= options.clickableFactor;
    const label = nodeLabel(node);
    if (keywords.some((k) => label.includes(k))) score *= options.keywordFactor;
    if (options.preferRightRail && node.bounds[0] >= railStart) score *= options.railFactor;
    if (best === null || score < best.score) best = { node, score };
  }

  return best ? centerOf(best.node.bounds) : point;
}

/**
 * Region to sample for an adaptive click: the nearest clickable element in
 * reach, or a synthetic square around the point.
 */
export function buildClickBox(
  point: Point,
  nodes: readonly UINode[],
  screen: ScreenSize,
  options: Pick<ClickBoxTuning, "boxRatio" | "minBoxPx" | "maxDistPx">,
): Bounds {
  let nearest: { node: UINode; d: number } | null = null;
  for (const node of nodes) {
    if (!node.clickable || boundsArea(node.bounds) <= 0) continue;
    const d = distance(centerOf(node.bounds), point);
    if (d > options.maxDistPx) continue;
    if (nearest === null || d < nearest.d) nearest = { node, d };
  }
  if (nearest) return nearest.node.bounds;

  const { width, height } = screen;
  const box = Math.max(options.minBoxPx, Math.floor(width * options.boxRatio));
  const half = Math.floor(box / 2);
  const [x, y] = point;
  const maxX = Math.max(1, width - 2);
  const maxY = Math.max(1, height - 2);
  const x1 = clamp(x - half, 1, maxX);
  const y1 = clamp(y - half, 1, maxY);
  const x2 = clamp(x + half, 1, maxX);
  const y2 = clamp(y + half, 1, maxY);
  return [Math.min(x1, x2), Math.min(y1, y2), Math.max(x1, x2), Math.max(y1, y2)];
}

export type ScrollDirection = "up" | "down" | "left" | "right";

export function parseDirection(raw: string | undefined): ScrollDirection | null {
  const dir = (raw ?? "").trim().toLowerCase();
  return dir === "up" || dir === "down" || dir === "left" || dir === "right" ? dir : null;
}

/**
 * Swipe endpoints that scroll the content in `direction`, proportional to the
 * screen. "down" moves the finger from bottom to top. With `from`, the same
 * stroke starts there instead.
 */
export function directionalSwipe(direction: ScrollDirection, screen: ScreenSize, from?: Point): [Point, Point] {
  const cx = Math.round(screen.width * 0.5);
  const cy = Math.round(screen.height * 0.5);
  const topY = Math.round(screen.height * 0.167);
  const bottomY = Math.round(screen.height * 0.667);
  const leftX = Math.round(screen.width * 0.167);
  const rightX = Math.round(screen.width * 0.833);

  let start: Point = [cx, bottomY];
  let end: Point = [cx, topY];
  if (direction === "up") {
    start = [cx, topY];
    end = [cx, bottomY];
  } else if (direction === "left") {
    start = [rightX, cy];
    end = [leftX, cy];
  } else if (direction === "right") {
    start = [leftX, cy];
    end = [rightX, cy];
  }
  if (!from) return [start, end];

  const maxX = Math.max(0, screen.width - 1);
  const maxY = Math.max(0, screen.height - 1);
  return [
    from,
    [clamp(from[0] + end[0] - start[0], 0, maxX), clamp(from[1] + end[1] - start[1], 0, maxY)],
  ];
}
