/**
 * SVG 片段拼接：转义、属性序列化与各元素模板
 */

import type { AttrMap, AttrValue, GradientDirection, GradientOptions } from './types';
import { formatNumber } from './format';

/** 文本节点转义 & < > */
export function escapeText(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** 属性值转义 & < > " ' */
export function escapeAttr(s: string): string {
  return escapeText(s).replace(/"/g, '&quot;').replace(/'/g, '&#39;');
}

function attrText(v: AttrValue): string {
  if (typeof v === 'number') return formatNumber(v);
  return escapeAttr(String(v));
}

export function renderAttrs(attrs: AttrMap): string {
  let out = '';
  attrs.forEach((v, k) => {
    out += ` ${k}="${attrText(v)}"`;
  });
  return out;
}

/** 内置属性在前，extra 中同名项覆盖内置值 */
function withExtras(base: AttrMap, cls: string | undefined, extra?: AttrMap): AttrMap {
  if (cls) base.set('class', cls);
  extra?.forEach((v, k) => base.set(k, v));
  return base;
}

export interface RectSpec {
  x: number;
  y: number;
  width: number;
  height: number;
  rx?: number;
  ry?: number;
  fill?: string;
  class?: string;
  attrs?: AttrMap;
}

/** 圆角矩形，宽度小于 0 时按 0 绘制 */
export function rectEl(spec: RectSpec): string {
  const base: AttrMap = new Map<string, AttrValue>([
    ['x', spec.x],
    ['y', spec.y],
    ['width', Math.max(0, spec.width)],
    ['height', spec.height],
    ['rx', spec.rx ?? 0],
    ['ry', spec.ry ?? 0],
    ['fill', spec.fill ?? '#000'],
  ]);
  return `<rect${renderAttrs(withExtras(base, spec.class, spec.attrs))} />`;
}

export interface TextStyle {
  fontFamily: string;
  fontSize: number;
  fill: string;
  anchor?: 'start' | 'middle' | 'end';
  dominantBaseline?: string;
  fontWeight?: string;
}

export function textEl(text: string, x: number, y: number, style: TextStyle): string {
  const attrs: AttrMap = new Map<string, AttrValue>([
    ['x', x],
    ['y', y],
    ['text-anchor', style.anchor ?? 'start'],
    ['dominant-baseline', style.dominantBaseline ?? 'alphabetic'],
    ['fill', style.fill],
    ['font-size', style.fontSize],
    ['font-family', style.fontFamily],
    ['font-weight', style.fontWeight ?? '400'],
  ]);
  return `<text${renderAttrs(attrs)}>${escapeText(text)}</text>`;
}

export interface SvgOpenSpec {
  width: number;
  height: number;
  background?: string;
  class?: string;
  attrs?: AttrMap;
  responsive: boolean;
}

/**
 * 根元素开标签（含可选背景矩形）。responsive 时 width 输出为 "100%"
 * 并关闭宽高比保持，viewBox 仍使用实际像素宽度
 */
export function svgOpen(spec: SvgOpenSpec): string {
  const { width, height } = spec;
  const base: AttrMap = new Map<string, AttrValue>([
    ['xmlns', 'http://www.w3.org/2000/svg'],
    ['width', width],
    ['height', height],
    ['viewBox', `0 0 ${formatNumber(width)} ${formatNumber(height)}`],
    ['role', 'img'],
    ['aria-label', 'Bar chart'],
  ]);
  const attrs = withExtras(base, spec.class, spec.attrs);
  if (spec.responsive) {
    attrs.set('width', '100%');
    attrs.set('preserveAspectRatio', 'none');
  }
  const bg =
    spec.background !== undefined
      ? rectEl({ x: 0, y: 0, width, height, fill: spec.background })
      : '';
  return `<svg${renderAttrs(attrs)}>${bg}`;
}

export const SVG_CLOSE = '</svg>';

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

type Coords = [x1: number, y1: number, x2: number, y2: number];

const DIRECTIONS: Record<GradientDirection, (b: Box) => Coords> = {
  right: ({ x, y, width }) => [x, y, x + width, y],
  down: ({ x, y, height }) => [x, y, x, y + height],
  down_right: ({ x, y, width, height }) => [x, y, x + width, y + height],
  down_left: ({ x, y, width, height }) => [x + width, y, x, y + height],
  up_right: ({ x, y, width, height }) => [x, y + height, x + width, y],
  up_left: ({ x, y, width, height }) => [x + width, y + height, x, y],
};

export function isGradientDirection(d: string): d is GradientDirection {
  return Object.prototype.hasOwnProperty.call(DIRECTIONS, d);
}

/** 渐变方向 → 包围盒内的 x1/y1/x2/y2 */
export function gradientCoords(direction: GradientDirection, box: Box): Coords {
  return DIRECTIONS[direction](box);
}

export function gradientDefs(id: string, gradient: GradientOptions, box: Box): string {
  const [x1, y1, x2, y2] = gradientCoords(gradient.direction, box);
  const attrs: AttrMap = new Map<string, AttrValue>([
    ['id', id],
    ['gradientUnits', 'userSpaceOnUse'],
    ['x1', x1],
    ['y1', y1],
    ['x2', x2],
    ['y2', y2],
  ]);
  return (
    `<defs><linearGradient${renderAttrs(attrs)}>` +
    `<stop offset="0%" stop-color="${escapeAttr(gradient.from)}" />` +
    `<stop offset="100%" stop-color="${escapeAttr(gradient.to)}" />` +
    '</linearGradient></defs>'
  );
}

/** 所有柱形的并集作为裁剪路径 */
export function clipDefs(id: string, bars: readonly RectSpec[]): string {
  const rects = bars.map((b) => rectEl({ ...b, fill: 'transparent' })).join('');
  return `<defs><clipPath id="${escapeAttr(id)}" clipPathUnits="userSpaceOnUse">${rects}</clipPath></defs>`;
}

/** 一整块渐变矩形，被柱形裁剪后只在柱内可见 */
export function gradientLayer(gradientId: string, clipId: string, box: Box): string {
  const rect = rectEl({ ...box, fill: `url(#${gradientId})` });
  return `<g clip-path="${escapeAttr(`url(#${clipId})`)}">${rect}</g>`;
}
