import { describe, it, expect } from 'vitest';
import { nextChartIds } from '../src/ids';

describe('nextChartIds', () => {
  it('never repeats an id across calls', () => {
    const a = nextChartIds();
    const b = nextChartIds();
    expect(a.gradientId).not.toBe(b.gradientId);
    expect(a.clipId).not.toBe(b.clipId);
    expect(a.gradientId).not.toBe(a.clipId);
  });

  it('uses an injected suffix generator', () => {
    expect(nextChartIds(() => 'x')).toEqual({
      gradientId: 'bc-grad-x',
      clipId: 'bc-bars-clip-x',
    });
  });
});
