import type { ChartIds } from './types';

/** 进程内自增计数，仅用于生成唯一 id 后缀 */
let chartSeq = 0;

export function nextChartSuffix(): string {
  chartSeq += 1;
  return String(chartSeq);
}

/** 每次渲染获取一组渐变 / 裁剪 id，可注入自定义后缀生成器 */
export function nextChartIds(generate: () => string = nextChartSuffix): ChartIds {
  const suffix = generate();
  return {
    gradientId: `bc-grad-${suffix}`,
    clipId: `bc-bars-clip-${suffix}`,
  };
}
