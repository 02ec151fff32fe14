/**
 * Text codec for saved worlds.
 *
 * One record per line, depth-first pre-order, depth given by leading tabs:
 *
 *   <tabs><uid>|"<source>"|px,py,pz|rx,ry,rz|sx,sy,sz|<size>|<json-properties>
 *
 * The parent of a line is the nearest preceding line one level shallower.
 * Descendants of a skipped line have no parent to hang from and load as
 * top-level records.
 */

import { isPropertyMap, type EntityRecord, type PropertyMap, type Vec3 } from '../types';
import type { EntityStore } from '../world/entityStore';

export interface ParsedLine {
  depth: number;
  record: EntityRecord;
}

export interface ParsedWorld {
  /** Records in file order with parentUid reconstructed from indentation. */
  records: EntityRecord[];
  /** 1-based numbers of the lines that were skipped as malformed. */
  skipped: number[];
}

/** Stack entry standing in for a skipped line. */
const MISSING_PARENT = '';

const LINE_PATTERN = /^(\t*)([^|\t"]+)\|("(?:[^"\\]|\\.)*")\|([^|]*)\|([^|]*)\|([^|]*)\|([^|]*)\|(.*)$/;

function formatVec3(v: Vec3): string {
  return `${v.x},${v.y},${v.z}`;
}

function parseNumber(raw: string): number | null {
  if (raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function parseVec3(raw: string): Vec3 | null {
  const parts = raw.split(',');
  if (parts.length !== 3) return null;
  const [x, y, z] = parts.map(parseNumber);
  if (x == null || y == null || z == null) return null;
  return { x, y, z };
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function formatLine(record: Readonly<EntityRecord>, depth: number): string {
  return [
    '\t'.repeat(depth) + record.uid,
    JSON.stringify(record.source),
    formatVec3(record.position),
    formatVec3(record.rotation),
    formatVec3(record.scale),
    String(record.size),
    JSON.stringify(record.properties),
  ].join('|');
}

/** Parse one line. Returns null when the line is malformed. parentUid is left empty. */
export function parseLine(line: string): ParsedLine | null {
  const match = LINE_PATTERN.exec(line.replace(/\r$/, ''));
  if (!match) return null;
  const [, tabs, uid, quotedSource, rawPos, rawRot, rawScale, rawSize, rawProps] = match;
  if (
    tabs === undefined ||
    uid === undefined ||
    quotedSource === undefined ||
    rawPos === undefined ||
    rawRot === undefined ||
    rawScale === undefined ||
    rawSize === undefined ||
    rawProps === undefined
  ) {
    return null;
  }

  const source = parseJson(quotedSource);
  const position = parseVec3(rawPos);
  const rotation = parseVec3(rawRot);
  const scale = parseVec3(rawScale);
  const size = parseNumber(rawSize);
  if (typeof source !== 'string' || !position || !rotation || !scale || size === null) {
    return null;
  }

  let properties: PropertyMap = {};
  if (rawProps.trim() !== '') {
    const parsed = parseJson(rawProps);
    if (!isPropertyMap(parsed)) return null;
    properties = parsed;
  }

  return {
    depth: tabs.length,
    record: { uid, source, position, rotation, scale, size, parentUid: '', properties },
  };
}

/** Serialize the whole store, one record per line, with a trailing newline. */
export function serializeWorld(store: EntityStore): string {
  const lines: string[] = [];
  store.walkDepthFirst((record, depth) => {
    lines.push(formatLine(record, depth));
  });
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

export function parseWorld(text: string): ParsedWorld {
  const records: EntityRecord[] = [];
  const skipped: number[] = [];
  /** uid of the most recent line at each depth; MISSING_PARENT where that line was skipped. */
  const stack: string[] = [];

  const lines = text.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';
    if (line.trim() === '') continue;

    const parsed = parseLine(line);
    // A line deeper than one below its predecessor has no parent to hang from
    if (!parsed || parsed.depth > stack.length) {
      skipped.push(i + 1);
      const depth = /^\t*/.exec(line)?.[0].length ?? 0;
      while (stack.length < depth) stack.push(MISSING_PARENT);
      stack.length = depth;
      stack.push(MISSING_PARENT);
      continue;
    }

    stack.length = parsed.depth;
    parsed.record.parentUid = stack[parsed.depth - 1] ?? '';
    stack.push(parsed.record.uid);
    records.push(parsed.record);
  }

  return { records, skipped };
}
