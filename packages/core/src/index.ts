/**
 * @barsvg/core — 横向柱状图 SVG 字符串渲染
 */

export * from './types';
export * from './errors';
export { renderBarChart, assembleChart } from './render';
export { normalizeData, toNumber } from './normalize';
export { computeLayout } from './layout';
export { formatValue, formatNumber } from './format';
export { mergeAttrs, mergeClass, normalizeClass, toAttrMap, parseItemOptions } from './attrs';
export { escapeText, escapeAttr, gradientCoords } from './markup';
export { nextChartIds } from './ids';
export {
  resolveOptions,
  chartOptionsSchema,
  DEFAULT_OPTIONS,
  DEFAULT_PADDING,
  DEFAULT_GRADIENT,
  DEFAULT_FONT_FAMILY,
} from './options';
