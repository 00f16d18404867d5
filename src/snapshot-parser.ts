/**
 * UI snapshot parser.
 * Turns a uiautomator / Appium page-source dump into a flat list of nodes in
 * document order. Elements may be `<node class="...">` or use the class name
 * as the tag; anything carrying a `bounds` attribute becomes a node.
 */

import { XMLParser } from "fast-xml-parser";

import type { Bounds, Point, UINode } from "./types.js";

const ZERO_BOUNDS: Bounds = [0, 0, 0, 0];
const BOUNDS_PATTERN = /\[(-?\d+),(-?\d+)\]/g;

type XmlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is XmlRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attr(attrs: XmlRecord, name: string): string {
  const value = attrs[`@_${name}`];
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

/** Parses "[x1,y1][x2,y2]". Anything else yields (0,0,0,0). */
export function parseBounds(raw: string): Bounds {
  const pairs = Array.from(raw.matchAll(BOUNDS_PATTERN));
  if (pairs.length !== 2) return ZERO_BOUNDS;
  const [first, second] = pairs;
  const coords = [first[1], first[2], second[1], second[2]].map((n) => parseInt(n, 10));
  if (coords.some((n) => !Number.isFinite(n))) return ZERO_BOUNDS;
  return [coords[0], coords[1], coords[2], coords[3]];
}

export function parseSnapshot(xml: string): UINode[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    allowBooleanAttributes: true,
    parseAttributeValue: false,
    preserveOrder: true,
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xml, { allowBooleanAttributes: true });
  } catch {
    console.log("Warning: Error parsing UI snapshot. The screen might be loading.");
    return [];
  }

  const nodes: UINode[] = [];

  // preserveOrder output: each element is { [tag]: children[], ":@"?: attributes }
  function walk(items: unknown): void {
    if (!Array.isArray(items)) return;
    for (const item of items) {
      if (!isRecord(item)) continue;
      const attrs = isRecord(item[":@"]) ? item[":@"] : {};
      for (const [tag, children] of Object.entries(item)) {
        if (tag === ":@" || tag === "#text" || tag.startsWith("?")) continue;
        if (attrs["@_bounds"] !== undefined) {
          nodes.push(toNode(tag, attrs, nodes.length));
        }
        walk(children);
      }
    }
  }

  walk(parsed);
  return nodes;
}

function toNode(tag: string, attrs: XmlRecord, index: number): UINode {
  return {
    className: attr(attrs, "class") || (tag === "node" ? "" : tag),
    bounds: parseBounds(attr(attrs, "bounds")),
    text: attr(attrs, "text"),
    contentDesc: attr(attrs, "content-desc"),
    resourceId: attr(attrs, "resource-id"),
    clickable: attr(attrs, "clickable") === "true",
    focusable: attr(attrs, "focusable") === "true",
    scrollable: attr(attrs, "scrollable") === "true",
    index,
  };
}

export function centerOf(bounds: Bounds): Point {
  const [x1, y1, x2, y2] = bounds;
  return [Math.floor((x1 + x2) / 2), Math.floor((y1 + y2) / 2)];
}

export function boundsArea(bounds: Bounds): number {
  const [x1, y1, x2, y2] = bounds;
  return Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
}

export function isPointInside(point: Point, bounds: Bounds): boolean {
  const [x, y] = point;
  const [x1, y1, x2, y2] = bounds;
  return x >= x1 && x <= x2 && y >= y1 && y <= y2;
}

/** Lower-cased text, description and identifier, space separated. */
export function nodeLabel(node: UINode): string {
  return [node.text, node.contentDesc, node.resourceId]
    .filter((part) => part.length > 0)
    .join(" ")
    .toLowerCase();
}

export interface NodeSelector {
  text?: string;
  contentDesc?: string;
  resourceId?: string;
}

function containsIgnoreCase(haystack: string, needle: string | undefined): boolean {
  if (!needle) return false;
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

/** First node (document order) matching any of the given selector fields. */
export function findBySelector(nodes: readonly UINode[], selector: NodeSelector): UINode | undefined {
  return nodes.find(
    (node) =>
      containsIgnoreCase(node.text, selector.text) ||
      containsIgnoreCase(node.contentDesc, selector.contentDesc) ||
      containsIgnoreCase(node.resourceId, selector.resourceId),
  );
}

/** Nodes whose label contains the whole query. */
export function findRelevantNodes(nodes: readonly UINode[], query: string): UINode[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];
  return nodes.filter((node) => boundsArea(node.bounds) > 0 && nodeLabel(node).includes(needle));
}
