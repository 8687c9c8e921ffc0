/**
 * 横向柱状图渲染：规范化 → 布局 → 拼接 SVG
 */

import type { BarRecord, ChartData, ChartIds, ChartOptions, Geometry, ResolvedOptions } from './types';
import { mergeAttrs, mergeClass } from './attrs';
import { nextChartIds } from './ids';
import { computeLayout } from './layout';
import {
  SVG_CLOSE,
  clipDefs,
  gradientDefs,
  gradientLayer,
  rectEl,
  svgOpen,
  textEl,
  type Box,
  type RectSpec,
  type TextStyle,
} from './markup';
import { normalizeData } from './normalize';
import { resolveOptions } from './options';

const LABEL_GAP = 8;
const VALUE_GAP = 6;

function barRect(o: ResolvedOptions, geo: Geometry, record: BarRecord, index: number): RectSpec {
  return {
    x: o.padding.left,
    y: geo.barY(index),
    width: Math.max(0, geo.scale(record.value)),
    height: o.barHeight,
    rx: o.barRadius,
    ry: o.barRadius,
  };
}

/**
 * 由规范化数据、几何与配置生成完整 SVG 字符串
 */
export function assembleChart(
  records: readonly BarRecord[],
  geo: Geometry,
  o: ResolvedOptions,
  ids: ChartIds
): string {
  const { padding, barHeight, fontFamily, fontSize } = o;
  const parts: string[] = [
    svgOpen({
      width: o.width,
      height: geo.height,
      background: o.background,
      class: o.svgClass,
      attrs: o.svgAttrs,
      responsive: o.responsive,
    }),
  ];

  const plot: Box = {
    x: padding.left,
    y: padding.top,
    width: geo.innerWidth,
    height: geo.totalBarsHeight,
  };
  const rects = records.map((r, i) => barRect(o, geo, r, i));

  if (o.gradient) {
    parts.push(gradientDefs(ids.gradientId, o.gradient, plot));
    parts.push(clipDefs(ids.clipId, rects));
  }

  if (o.title !== undefined) {
    parts.push(
      textEl(o.title, padding.left, Math.max(0, padding.top / 2 + fontSize), {
        fontFamily,
        fontSize: fontSize + 2,
        fill: o.titleColor,
        fontWeight: '600',
      })
    );
  }

  if (o.gradient) parts.push(gradientLayer(ids.gradientId, ids.clipId, plot));

  const labelStyle: TextStyle = {
    fontFamily,
    fontSize,
    fill: o.labelColor,
    anchor: 'end',
    dominantBaseline: 'middle',
  };
  const valueStyle: TextStyle = { ...labelStyle, fill: o.valueColor, anchor: 'start' };
  const fill = o.gradient ? 'transparent' : o.barColor;

  records.forEach((r, i) => {
    const rect = rects[i];
    const midY = rect.y + barHeight / 2;
    parts.push(textEl(r.label, padding.left - LABEL_GAP, midY, labelStyle));
    parts.push(
      rectEl({
        ...rect,
        fill,
        class: mergeClass(o.barClass, r.class),
        attrs: mergeAttrs(o.barAttrs, r.attrs),
      })
    );
    if (o.showValues) {
      const x = padding.left + rect.width + VALUE_GAP;
      parts.push(textEl(o.valueFormatter(r.value), x, midY, valueStyle));
    }
  });

  if (records.length === 0) {
    parts.push(
      textEl('No data', padding.left, padding.top + barHeight / 2, {
        ...labelStyle,
        anchor: 'start',
      })
    );
  }

  parts.push(SVG_CLOSE);
  return parts.join('');
}

/**
 * 渲染横向柱状图，返回已完整转义的 `<svg>` 字符串。
 *
 * 宿主嵌入时应按原始 HTML 处理，不要再次转义。
 *
 * @throws InvalidDataShapeError / InvalidNumericValueError / InvalidOptionValueError
 */
export function renderBarChart(data: ChartData, options: ChartOptions = {}): string {
  const o = resolveOptions(options);
  const records = normalizeData(data);
  const geo = computeLayout(records, o);
  const ids = nextChartIds(o.idGenerator);
  return assembleChart(records, geo, o, ids);
}
