/** 横向柱状图的输入、配置与中间结构类型 */

/** 属性值：布尔值按 "true"/"false" 输出，数字按 formatNumber 输出 */
export type AttrValue = string | number | boolean;

/** 规范化后的属性表，保留插入顺序 */
export type AttrMap = Map<string, AttrValue>;

export type AttrRecord = { readonly [key: string]: AttrValue };

/** 单个条目：键值对、对象，或裸 token（视为 true） */
export type AttrEntry = readonly [string | number, AttrValue] | AttrRecord | string;

/** 属性来源：对象、Map，或条目列表 */
export type AttrSource =
  | AttrRecord
  | ReadonlyMap<string, AttrValue>
  | readonly AttrEntry[]
  | null
  | undefined;

/** class 来源：字符串或（可嵌套的）字符串列表，空值会被丢弃 */
export type ClassSource = string | null | undefined | false | readonly ClassSource[];

/** 每个数据点的附加选项 */
export type ItemOptions =
  | { readonly attrs?: AttrSource; readonly class?: ClassSource }
  | AttrRecord
  | readonly AttrEntry[];

export type Label = string | number | boolean | bigint;

/** 数值：数字或可解析为数字的字符串 */
export type NumericInput = number | string;

export type BarTuple =
  | readonly [Label, NumericInput]
  | readonly [Label, NumericInput, ItemOptions | null | undefined];

export type MappedValue = NumericInput | readonly [NumericInput, ItemOptions | null | undefined];

/**
 * 三种输入形状：
 * - `[label, value]` / `[label, value, itemOpts]` 元组列表
 * - 纯数字列表（标签为 "1", "2", ...）
 * - label → value 的映射（按标签排序）
 */
export type ChartData =
  | readonly BarTuple[]
  | readonly number[]
  | { readonly [label: string]: MappedValue }
  | ReadonlyMap<Label, MappedValue>;

/** 规范化后的一条柱数据 */
export interface BarRecord {
  label: string;
  value: number;
  attrs: AttrMap;
  class?: string;
}

export type GradientDirection = 'right' | 'down' | 'down_right' | 'down_left' | 'up_right' | 'up_left';

export interface GradientOptions {
  from: string;
  to: string;
  direction: GradientDirection;
}

export interface Padding {
  left: number;
  right: number;
  top: number;
  bottom: number;
}

export type ValueFormatter = (value: number) => string;

/** 调用方传入的配置，全部可选 */
export interface ChartOptions {
  title?: string | null;
  width?: number;
  barHeight?: number;
  barGap?: number;
  padding?: Partial<Padding>;
  barRadius?: number;
  barColor?: string;
  labelColor?: string;
  valueColor?: string;
  titleColor?: string;
  background?: string | null;
  showValues?: boolean;
  valueFormatter?: ValueFormatter;
  fontFamily?: string;
  fontSize?: number;
  /** true 使用默认渐变；false/null 关闭 */
  gradient?: boolean | null | Partial<GradientOptions>;
  svgAttrs?: AttrSource;
  svgClass?: ClassSource;
  barAttrs?: AttrSource;
  barClass?: ClassSource;
  responsive?: boolean;
  /** 生成渐变/裁剪 id 的后缀，默认使用进程内自增计数 */
  idGenerator?: () => string;
}

/** 合并默认值后的配置 */
export interface ResolvedOptions {
  title?: string;
  width: number;
  barHeight: number;
  barGap: number;
  padding: Padding;
  barRadius: number;
  barColor: string;
  labelColor: string;
  valueColor: string;
  titleColor: string;
  background?: string;
  showValues: boolean;
  valueFormatter: ValueFormatter;
  fontFamily: string;
  fontSize: number;
  gradient?: GradientOptions;
  svgAttrs: AttrMap;
  svgClass?: string;
  barAttrs: AttrMap;
  barClass?: string;
  responsive: boolean;
  idGenerator?: () => string;
}

/** 单次渲染的几何信息，不跨调用保存 */
export interface Geometry {
  innerWidth: number;
  totalBarsHeight: number;
  height: number;
  maxValue: number;
  scale: (value: number) => number;
  /** 第 i 根柱的 y 坐标 */
  barY: (index: number) => number;
}

export interface ChartIds {
  gradientId: string;
  clipId: string;
}
