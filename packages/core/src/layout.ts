/**
 * 几何布局：画布尺寸、线性比例尺与每根柱的 y 坐标（不取整）
 */

import type { BarRecord, Geometry, ResolvedOptions } from './types';

type LayoutOptions = Pick<ResolvedOptions, 'width' | 'barHeight' | 'barGap' | 'padding'>;

export function computeLayout(records: readonly BarRecord[], options: LayoutOptions): Geometry {
  const { width, barHeight, barGap, padding } = options;
  const n = records.length;
  const innerWidth = Math.max(width - padding.left - padding.right, 0);
  // 空数据时仍保留一根柱的高度用于占位文字
  const totalBarsHeight = n > 0 ? n * barHeight + (n - 1) * barGap : barHeight;
  const height = padding.top + totalBarsHeight + padding.bottom;
  const maxValue = records.reduce((max, r) => Math.max(max, r.value), 0);

  const scale =
    maxValue === 0 || innerWidth === 0
      ? () => 0
      : (v: number) => (v / maxValue) * innerWidth;

  return {
    innerWidth,
    totalBarsHeight,
    height,
    maxValue,
    scale,
    barY: (index) => padding.top + index * (barHeight + barGap),
  };
}
