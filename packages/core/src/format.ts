/**
 * 格式化工具
 */

/** 保留至多 decimals 位小数并去掉末尾的 0 和多余的小数点 */
function toCompactFixed(num: number, decimals: number): string {
  const s = num
    .toFixed(decimals)
    .replace(/(\.\d*?)0+$/, '$1')
    .replace(/\.$/, '');
  return s === '-0' ? '0' : s;
}

/** 属性里的数字：整数按完整位数输出（不用指数形式），否则最多两位小数 */
export function formatNumber(num: number): string {
  return Number.isInteger(num) ? BigInt(num).toString() : toCompactFixed(num, 2);
}

/**
 * 默认数值格式化：10.0 → "10"，3.140 → "3.14"，0.50 → "0.5"
 */
export function formatValue(value: number): string {
  return formatNumber(value);
}
