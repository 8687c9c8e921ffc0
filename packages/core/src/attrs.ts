/**
 * 属性 / class 合并：把对象、Map、键值对列表等统一为有序 AttrMap
 */

import type { AttrMap, AttrValue } from './types';
import { InvalidOptionValueError, inspect } from './errors';

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (v === null || typeof v !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function isAttrValue(v: unknown): v is AttrValue {
  return typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean';
}

// 属性名里不能出现空白、引号、=、/、< 或 >
const ATTR_NAME_RE = /^[^\s"'<>/=]+$/;

function toAttrKey(k: unknown, where: string): string {
  const key = typeof k === 'string' || typeof k === 'number' ? String(k) : undefined;
  if (key === undefined || !ATTR_NAME_RE.test(key)) {
    throw new InvalidOptionValueError(`${where}: unsupported attribute key ${inspect(k)}`);
  }
  return key;
}

function putAttr(out: AttrMap, key: unknown, value: unknown, where: string): void {
  const k = toAttrKey(key, where);
  if (value === null || value === undefined) return;
  if (!isAttrValue(value)) {
    throw new InvalidOptionValueError(
      `${where}: attribute "${k}" has unsupported value ${inspect(value)}`
    );
  }
  out.set(k, value);
}

function putEntries(out: AttrMap, entries: Iterable<[unknown, unknown]>, where: string): void {
  for (const [k, v] of entries) putAttr(out, k, v, where);
}

/**
 * 将一个属性来源规范化为 AttrMap：
 * - 对象 / Map：逐项写入
 * - 列表：元素可为 [key, value]、对象，或裸 token（值为 true）
 * - null / undefined：空表
 */
export function toAttrMap(source: unknown, where = 'attrs'): AttrMap {
  const out: AttrMap = new Map();
  if (source === null || source === undefined) return out;
  if (source instanceof Map) {
    putEntries(out, source.entries(), where);
    return out;
  }
  if (isPlainObject(source)) {
    putEntries(out, Object.entries(source), where);
    return out;
  }
  if (!Array.isArray(source)) {
    throw new InvalidOptionValueError(
      `${where}: expected an object, Map or list of [key, value] pairs, got ${inspect(source)}`
    );
  }
  source.forEach((item: unknown) => {
    if (Array.isArray(item) && item.length === 2) putAttr(out, item[0], item[1], where);
    else if (isPlainObject(item)) putEntries(out, Object.entries(item), where);
    else if (typeof item === 'string' || typeof item === 'number') putAttr(out, item, true, where);
    else
      throw new InvalidOptionValueError(`${where}: unsupported attribute entry ${inspect(item)}`);
  });
  return out;
}

/** 单项属性覆盖全局同名属性，其余保留全局值；顺序以全局为先 */
export function mergeAttrs(globalSource: unknown, itemSource: unknown): AttrMap {
  const out = toAttrMap(globalSource);
  toAttrMap(itemSource).forEach((v, k) => out.set(k, v));
  return out;
}

function collectClasses(source: unknown, out: string[]): void {
  if (source === null || source === undefined || source === false) return;
  if (Array.isArray(source)) {
    source.forEach((s: unknown) => collectClasses(s, out));
    return;
  }
  if (typeof source === 'string' || typeof source === 'number') {
    const s = String(source).trim();
    if (s) out.push(s);
    return;
  }
  throw new InvalidOptionValueError(`class: unsupported value ${inspect(source)}`);
}

/** 展平 class 列表，丢弃空项，以单个空格拼接；全为空时返回 undefined */
export function normalizeClass(source: unknown): string | undefined {
  const out: string[] = [];
  collectClasses(source, out);
  return out.length > 0 ? out.join(' ') : undefined;
}

/** class 是叠加而非覆盖：全局在前，单项在后 */
export function mergeClass(globalClasses: unknown, itemClasses: unknown): string | undefined {
  return normalizeClass([globalClasses, itemClasses]);
}

/** 单个数据点选项解析结果 */
export interface ParsedItemOptions {
  attrs: AttrMap;
  class?: string;
}

/**
 * 解析数据点选项：
 * - 含 attrs / class 键时分别提取
 * - 否则整个结构（去掉 class 键）作为属性来源
 */
export function parseItemOptions(opts: unknown): ParsedItemOptions {
  if (opts === null || opts === undefined) return { attrs: new Map() };
  const where = 'item options';

  if (isPlainObject(opts)) {
    const { attrs, class: cls, ...rest } = opts;
    return {
      attrs: toAttrMap(attrs !== undefined ? attrs : rest, where),
      class: normalizeClass(cls),
    };
  }

  if (Array.isArray(opts)) {
    let attrs: unknown;
    let cls: unknown;
    const rest: unknown[] = [];
    const entries: unknown[] = opts;
    for (const entry of entries) {
      if (Array.isArray(entry) && entry.length === 2 && entry[0] === 'attrs') attrs = entry[1];
      else if (Array.isArray(entry) && entry.length === 2 && entry[0] === 'class') cls = entry[1];
      else rest.push(entry);
    }
    return {
      attrs: toAttrMap(attrs !== undefined ? attrs : rest, where),
      class: normalizeClass(cls),
    };
  }

  throw new InvalidOptionValueError(`${where}: expected an object or list, got ${inspect(opts)}`);
}
