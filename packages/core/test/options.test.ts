import { afterEach, describe, it, expect, vi } from 'vitest';
import { DEFAULT_FONT_FAMILY, resolveOptions } from '../src/options';
import { InvalidOptionValueError } from '../src/errors';
import { formatValue } from '../src/format';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('resolveOptions', () => {
  it('fills every default', () => {
    const o = resolveOptions({});
    expect(o).toMatchObject({
      width: 640,
      barHeight: 28,
      barGap: 2,
      padding: { left: 120, right: 48, top: 32, bottom: 24 },
      barRadius: 6,
      barColor: '#4f46e5',
      labelColor: '#111827',
      valueColor: '#111827',
      titleColor: '#111827',
      showValues: true,
      fontFamily: DEFAULT_FONT_FAMILY,
      fontSize: 12,
      responsive: false,
    });
    expect(o.valueFormatter).toBe(formatValue);
    expect(o.title).toBeUndefined();
    expect(o.background).toBeUndefined();
    expect(o.gradient).toBeUndefined();
    expect(o.svgAttrs.size).toBe(0);
  });

  it('merges a partial padding over the defaults', () => {
    expect(resolveOptions({ padding: { left: 20 } }).padding).toEqual({
      left: 20,
      right: 48,
      top: 32,
      bottom: 24,
    });
  });

  it('drops blank titles', () => {
    expect(resolveOptions({ title: '   ' }).title).toBeUndefined();
    expect(resolveOptions({ title: null }).title).toBeUndefined();
    expect(resolveOptions({ title: ' Sales ' }).title).toBe(' Sales ');
  });

  it('resolves gradient shorthands', () => {
    expect(resolveOptions({ gradient: true }).gradient).toEqual({
      from: '#4f46e5',
      to: '#a78bfa',
      direction: 'right',
    });
    expect(resolveOptions({ gradient: false }).gradient).toBeUndefined();
    expect(resolveOptions({ gradient: { to: '#000', direction: 'up_left' } }).gradient).toEqual({
      from: '#4f46e5',
      to: '#000',
      direction: 'up_left',
    });
  });

  it('warns and falls back to right for an unknown direction', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const o = resolveOptions({ gradient: { direction: 'sideways' } });
    expect(o.gradient?.direction).toBe('right');
    expect(warn).toHaveBeenCalledWith(
      'Unknown gradient direction "sideways", falling back to "right"'
    );
  });

  it('normalizes global attribute and class sources', () => {
    const o = resolveOptions({ barAttrs: [['data-role', 'bar']], svgClass: ['a', '', 'b'] });
    expect([...o.barAttrs]).toEqual([['data-role', 'bar']]);
    expect(o.svgClass).toBe('a b');
    expect(o.barClass).toBeUndefined();
  });

  it('rejects structurally invalid values with the failing path', () => {
    expect(() => resolveOptions({ width: -1 })).toThrow(InvalidOptionValueError);
    expect(() => resolveOptions({ width: -1 })).toThrow(/width: /);
    expect(() => resolveOptions({ padding: { top: 'x' } })).toThrow(/padding\.top: /);
    expect(() => resolveOptions({ valueFormatter: 'nope' })).toThrow(
      /valueFormatter: expected a function/
    );
    expect(() => resolveOptions({ showValues: 'yes' })).toThrow(InvalidOptionValueError);
    expect(() => resolveOptions({ svgAttrs: 12 })).toThrow(/svgAttrs: expected an object/);
    expect(() => resolveOptions('wide')).toThrow(InvalidOptionValueError);
  });
});
