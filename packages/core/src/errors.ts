/**
 * 渲染错误：全部为调用方输入错误，在生成任何输出之前同步抛出
 */

export type BarChartErrorKind = 'InvalidDataShape' | 'InvalidNumericValue' | 'InvalidOptionValue';

export class BarChartError extends Error {
  readonly kind: BarChartErrorKind;

  constructor(kind: BarChartErrorKind, message: string) {
    super(message);
    this.name = `${kind}Error`;
    this.kind = kind;
  }
}

export class InvalidDataShapeError extends BarChartError {
  constructor(message: string) {
    super('InvalidDataShape', message);
  }
}

export class InvalidNumericValueError extends BarChartError {
  constructor(message: string) {
    super('InvalidNumericValue', message);
  }
}

export class InvalidOptionValueError extends BarChartError {
  constructor(message: string) {
    super('InvalidOptionValue', message);
  }
}

const MAX_INSPECT = 60;

/** 错误信息里展示的值 */
export function inspect(value: unknown): string {
  let s: string;
  if (typeof value === 'string') s = JSON.stringify(value);
  else if (typeof value === 'function') s = '[function]';
  else if (typeof value === 'bigint') s = `${value}n`;
  else if (value instanceof Map) s = `Map(${value.size})`;
  else {
    try {
      s = JSON.stringify(value) ?? String(value);
    } catch {
      s = String(value);
    }
  }
  return s.length > MAX_INSPECT ? s.slice(0, MAX_INSPECT - 3) + '...' : s;
}
