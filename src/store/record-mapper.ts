import {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
  type Record as Neo4jRecord,
} from 'neo4j-driver';
import type { QueryRecord } from '../types.js';

function mapProperties(properties: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(properties)) {
    out[key] = mapValue(value);
  }
  return out;
}

/**
 * Converts a driver value into plain JS. Integers become numbers (bigint
 * outside the safe range), graph entities become their property maps and
 * temporal values become ISO-8601 strings.
 */
export function mapValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toBigInt();
  }
  if (isNode(value) || isRelationship(value)) {
    return mapProperties(value.properties);
  }
  if (isPath(value)) {
    return [value.start, ...value.segments.map((s) => s.end)].map((n) => mapProperties(n.properties));
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isTime(value) ||
    isLocalTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }
  if (isPoint(value)) {
    return {
      srid: mapValue(value.srid),
      x: value.x,
      y: value.y,
      ...(value.z !== undefined ? { z: value.z } : {}),
    };
  }
  if (Array.isArray(value)) {
    return value.map(mapValue);
  }
  if (typeof value === 'object') {
    return mapProperties(Object.fromEntries(Object.entries(value)));
  }
  return value;
}

export function mapRecord(record: Neo4jRecord): QueryRecord {
  return mapProperties(record.toObject());
}
