/**
 * 配置：zod 校验 + 默认值合并
 */

import { z } from 'zod';
import type { GradientOptions, Padding, ResolvedOptions, ValueFormatter } from './types';
import { normalizeClass, toAttrMap } from './attrs';
import { InvalidOptionValueError } from './errors';
import { formatValue } from './format';
import { isGradientDirection } from './markup';

export const DEFAULT_FONT_FAMILY =
  'system-ui, -apple-system, Segoe UI, Roboto, Helvetica, Arial, sans-serif';

export const DEFAULT_PADDING: Readonly<Padding> = Object.freeze({
  left: 120,
  right: 48,
  top: 32,
  bottom: 24,
});

export const DEFAULT_GRADIENT: Readonly<GradientOptions> = Object.freeze({
  from: '#4f46e5',
  to: '#a78bfa',
  direction: 'right',
});

export const DEFAULT_OPTIONS = Object.freeze({
  width: 640,
  barHeight: 28,
  barGap: 2,
  padding: DEFAULT_PADDING,
  barRadius: 6,
  barColor: '#4f46e5',
  labelColor: '#111827',
  valueColor: '#111827',
  titleColor: '#111827',
  showValues: true,
  valueFormatter: formatValue,
  fontFamily: DEFAULT_FONT_FAMILY,
  fontSize: 12,
  responsive: false,
});

const finite = z.number().finite();
const positive = finite.positive();
const nonNegative = finite.nonnegative();
const fn = <T extends (...args: never[]) => unknown>() =>
  z.custom<T>((v) => typeof v === 'function', { message: 'expected a function' });

const gradientSchema = z.union([
  z.boolean(),
  z.null(),
  z.object({
    from: z.string().optional(),
    to: z.string().optional(),
    direction: z.string().optional(),
  }),
]);

/** 颜色、字体等字符串原样透传，不校验是否为合法 CSS */
export const chartOptionsSchema = z.object({
  title: z.string().nullable().optional(),
  width: positive.optional(),
  barHeight: positive.optional(),
  barGap: nonNegative.optional(),
  padding: z
    .object({
      left: finite.optional(),
      right: finite.optional(),
      top: finite.optional(),
      bottom: finite.optional(),
    })
    .optional(),
  barRadius: nonNegative.optional(),
  barColor: z.string().optional(),
  labelColor: z.string().optional(),
  valueColor: z.string().optional(),
  titleColor: z.string().optional(),
  background: z.string().nullable().optional(),
  showValues: z.boolean().optional(),
  valueFormatter: fn<ValueFormatter>().optional(),
  fontFamily: z.string().optional(),
  fontSize: positive.optional(),
  gradient: gradientSchema.optional(),
  svgAttrs: z.unknown().optional(),
  svgClass: z.unknown().optional(),
  barAttrs: z.unknown().optional(),
  barClass: z.unknown().optional(),
  responsive: z.boolean().optional(),
  idGenerator: fn<() => string>().optional(),
});

type GradientInput = z.infer<typeof gradientSchema>;

function resolveGradient(input: GradientInput | undefined): GradientOptions | undefined {
  if (input === undefined || input === null || input === false) return undefined;
  if (input === true) return { ...DEFAULT_GRADIENT };
  const direction = input.direction ?? DEFAULT_GRADIENT.direction;
  if (!isGradientDirection(direction)) {
    console.warn(`Unknown gradient direction "${direction}", falling back to "right"`);
  }
  return {
    from: input.from ?? DEFAULT_GRADIENT.from,
    to: input.to ?? DEFAULT_GRADIENT.to,
    direction: isGradientDirection(direction) ? direction : 'right',
  };
}

/** 校验并合并默认值；失败时抛出 InvalidOptionValueError，列出所有出错的选项路径 */
export function resolveOptions(options: unknown = {}): ResolvedOptions {
  const parsed = chartOptionsSchema.safeParse(options ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.') || '(options)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidOptionValueError(`invalid bar chart options: ${details}`);
  }
  const o = parsed.data;
  const title = o.title ?? undefined;

  return {
    title: title !== undefined && title.trim() !== '' ? title : undefined,
    width: o.width ?? DEFAULT_OPTIONS.width,
    barHeight: o.barHeight ?? DEFAULT_OPTIONS.barHeight,
    barGap: o.barGap ?? DEFAULT_OPTIONS.barGap,
    padding: {
      left: o.padding?.left ?? DEFAULT_PADDING.left,
      right: o.padding?.right ?? DEFAULT_PADDING.right,
      top: o.padding?.top ?? DEFAULT_PADDING.top,
      bottom: o.padding?.bottom ?? DEFAULT_PADDING.bottom,
    },
    barRadius: o.barRadius ?? DEFAULT_OPTIONS.barRadius,
    barColor: o.barColor ?? DEFAULT_OPTIONS.barColor,
    labelColor: o.labelColor ?? DEFAULT_OPTIONS.labelColor,
    valueColor: o.valueColor ?? DEFAULT_OPTIONS.valueColor,
    titleColor: o.titleColor ?? DEFAULT_OPTIONS.titleColor,
    background: o.background ?? undefined,
    showValues: o.showValues ?? DEFAULT_OPTIONS.showValues,
    valueFormatter: o.valueFormatter ?? DEFAULT_OPTIONS.valueFormatter,
    fontFamily: o.fontFamily ?? DEFAULT_OPTIONS.fontFamily,
    fontSize: o.fontSize ?? DEFAULT_OPTIONS.fontSize,
    gradient: resolveGradient(o.gradient),
    svgAttrs: toAttrMap(o.svgAttrs, 'svgAttrs'),
    svgClass: normalizeClass(o.svgClass),
    barAttrs: toAttrMap(o.barAttrs, 'barAttrs'),
    barClass: normalizeClass(o.barClass),
    responsive: o.responsive ?? DEFAULT_OPTIONS.responsive,
    idGenerator: o.idGenerator,
  };
}
