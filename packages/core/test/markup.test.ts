import { describe, it, expect } from 'vitest';
import {
  clipDefs,
  escapeAttr,
  escapeText,
  gradientCoords,
  gradientDefs,
  gradientLayer,
  rectEl,
  svgOpen,
  textEl,
} from '../src/markup';

const box = { x: 10, y: 20, width: 100, height: 50 };

describe('escaping', () => {
  it('escapes text content', () => {
    expect(escapeText('<b>&"x"\'')).toBe('&lt;b&gt;&amp;"x"\'');
  });

  it('escapes attribute values including quotes', () => {
    expect(escapeAttr(`a"b<c>&'`)).toBe('a&quot;b&lt;c&gt;&amp;&#39;');
  });
});

describe('gradientCoords', () => {
  it('maps each direction onto the bounding box', () => {
    expect(gradientCoords('right', box)).toEqual([10, 20, 110, 20]);
    expect(gradientCoords('down', box)).toEqual([10, 20, 10, 70]);
    expect(gradientCoords('down_right', box)).toEqual([10, 20, 110, 70]);
    expect(gradientCoords('down_left', box)).toEqual([110, 20, 10, 70]);
    expect(gradientCoords('up_right', box)).toEqual([10, 70, 110, 20]);
    expect(gradientCoords('up_left', box)).toEqual([110, 70, 10, 20]);
  });
});

describe('elements', () => {
  it('clamps negative rect widths to zero', () => {
    expect(rectEl({ x: 1, y: 2, width: -40, height: 3 })).toBe(
      '<rect x="1" y="2" width="0" height="3" rx="0" ry="0" fill="#000" />'
    );
  });

  it('lets extra attributes override built-in ones in place', () => {
    const rect = rectEl({
      x: 0,
      y: 0,
      width: 10.456,
      height: 5,
      fill: 'blue',
      class: 'bar',
      attrs: new Map<string, string | number | boolean>([
        ['fill', 'red'],
        ['data-on', true],
      ]),
    });
    expect(rect).toBe(
      '<rect x="0" y="0" width="10.46" height="5" rx="0" ry="0" fill="red" class="bar" data-on="true" />'
    );
  });

  it('renders text with escaped content', () => {
    const text = textEl('a < b', 5, 6.5, { fontFamily: 'sans', fontSize: 12, fill: '#111' });
    expect(text).toBe(
      '<text x="5" y="6.5" text-anchor="start" dominant-baseline="alphabetic" fill="#111" font-size="12" font-family="sans" font-weight="400">a &lt; b</text>'
    );
  });

  it('opens the root element with an optional background', () => {
    expect(svgOpen({ width: 200, height: 80, background: '#fff', responsive: false })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="200" height="80" viewBox="0 0 200 80" role="img" aria-label="Bar chart">' +
        '<rect x="0" y="0" width="200" height="80" rx="0" ry="0" fill="#fff" />'
    );
  });

  it('switches to a percentage width in responsive mode', () => {
    expect(svgOpen({ width: 200, height: 80, responsive: true, class: 'chart' })).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="100%" height="80" viewBox="0 0 200 80" role="img" aria-label="Bar chart" class="chart" preserveAspectRatio="none">'
    );
  });

  it('builds gradient and clip definitions', () => {
    expect(gradientDefs('g1', { from: '#000', to: '#fff', direction: 'down' }, box)).toBe(
      '<defs><linearGradient id="g1" gradientUnits="userSpaceOnUse" x1="10" y1="20" x2="10" y2="70">' +
        '<stop offset="0%" stop-color="#000" /><stop offset="100%" stop-color="#fff" />' +
        '</linearGradient></defs>'
    );
    expect(clipDefs('c1', [{ x: 1, y: 2, width: 3, height: 4, rx: 1, ry: 1 }])).toBe(
      '<defs><clipPath id="c1" clipPathUnits="userSpaceOnUse">' +
        '<rect x="1" y="2" width="3" height="4" rx="1" ry="1" fill="transparent" />' +
        '</clipPath></defs>'
    );
    expect(gradientLayer('g1', 'c1', box)).toBe(
      '<g clip-path="url(#c1)"><rect x="10" y="20" width="100" height="50" rx="0" ry="0" fill="url(#g1)" /></g>'
    );
  });
});
