/**
 * 输入数据规范化：三种形状统一为 BarRecord 列表
 */

import type { BarRecord } from './types';
import { isPlainObject, parseItemOptions } from './attrs';
import { InvalidDataShapeError, InvalidNumericValueError, inspect } from './errors';

type DataShape =
  | { kind: 'empty' }
  | { kind: 'tuples'; items: readonly unknown[] }
  | { kind: 'numbers'; items: readonly unknown[] }
  | { kind: 'mapping'; entries: [unknown, unknown][] };

/** 只看容器类型和首元素判定形状 */
function detectShape(data: unknown): DataShape {
  if (Array.isArray(data)) {
    const items: readonly unknown[] = data;
    if (items.length === 0) return { kind: 'empty' };
    const first = items[0];
    if (Array.isArray(first)) return { kind: 'tuples', items };
    if (typeof first === 'number') return { kind: 'numbers', items };
    throw new InvalidDataShapeError(
      `bar chart data list must contain numbers or [label, value] / [label, value, itemOpts] tuples, got first item ${inspect(first)}`
    );
  }
  if (data instanceof Map) {
    const entries: [unknown, unknown][] = [...data.entries()];
    return entries.length === 0 ? { kind: 'empty' } : { kind: 'mapping', entries };
  }
  if (isPlainObject(data)) {
    const entries: [unknown, unknown][] = Object.entries(data);
    return entries.length === 0 ? { kind: 'empty' } : { kind: 'mapping', entries };
  }
  throw new InvalidDataShapeError(`unsupported data shape for bar chart: ${inspect(data)}`);
}

const NUMERIC_RE = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/;

/** 数字原样返回；数字字符串解析为浮点数 */
export function toNumber(v: unknown): number {
  if (typeof v === 'number') {
    if (!Number.isFinite(v)) throw new InvalidNumericValueError(`non-finite value: ${v}`);
    return v;
  }
  if (typeof v === 'string') {
    if (!NUMERIC_RE.test(v)) {
      throw new InvalidNumericValueError(`cannot parse number from string: ${inspect(v)}`);
    }
    return parseFloat(v);
  }
  throw new InvalidNumericValueError(`unsupported numeric value: ${inspect(v)}`);
}

/** 标签不能为空字符串 */
function toLabel(v: unknown): string {
  if (typeof v === 'string') {
    if (v === '') throw new InvalidDataShapeError('bar chart labels must not be empty');
    return v;
  }
  if (typeof v === 'number' || typeof v === 'boolean' || typeof v === 'bigint') return String(v);
  throw new InvalidDataShapeError(`unsupported label: ${inspect(v)}`);
}

function tupleRecord(item: unknown, index: number): BarRecord {
  if (!Array.isArray(item)) {
    throw new InvalidDataShapeError(
      `bar chart data list mixes tuples with other items (item ${index}: ${inspect(item)})`
    );
  }
  const tuple: readonly unknown[] = item;
  if (tuple.length !== 2 && tuple.length !== 3) {
    throw new InvalidDataShapeError(
      `expected [label, value] or [label, value, itemOpts], got ${tuple.length} elements at item ${index}`
    );
  }
  return {
    label: toLabel(tuple[0]),
    value: toNumber(tuple[1]),
    ...parseItemOptions(tuple[2]),
  };
}

function numberRecord(item: unknown, index: number): BarRecord {
  if (Array.isArray(item)) {
    throw new InvalidDataShapeError(
      `bar chart data list mixes numbers with tuples (item ${index}: ${inspect(item)})`
    );
  }
  return { label: String(index + 1), value: toNumber(item), attrs: new Map() };
}

function mappingRecord([label, entry]: [unknown, unknown]): BarRecord {
  if (Array.isArray(entry)) {
    const pair: readonly unknown[] = entry;
    if (pair.length !== 2) {
      throw new InvalidDataShapeError(
        `expected value or [value, itemOpts] for label ${inspect(label)}, got ${inspect(entry)}`
      );
    }
    return { label: toLabel(label), value: toNumber(pair[0]), ...parseItemOptions(pair[1]) };
  }
  return { label: toLabel(label), value: toNumber(entry), attrs: new Map() };
}

function byLabel(a: BarRecord, b: BarRecord): number {
  if (a.label < b.label) return -1;
  return a.label > b.label ? 1 : 0;
}

/**
 * 规范化输入数据：
 * - 元组列表、数字列表保持输入顺序
 * - 映射没有自然顺序，按标签字典序排序
 * - 空列表 / 空映射返回空数组
 *
 * 接受 ChartData 的任一形状；类型之外的输入抛出 InvalidDataShapeError
 */
export function normalizeData(data: unknown): BarRecord[] {
  const shape = detectShape(data);
  switch (shape.kind) {
    case 'empty':
      return [];
    case 'tuples':
      return shape.items.map(tupleRecord);
    case 'numbers':
      return shape.items.map(numberRecord);
    case 'mapping':
      return shape.entries.map(mappingRecord).sort(byLabel);
  }
}
