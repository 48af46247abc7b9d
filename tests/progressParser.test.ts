import fc from 'fast-check';
import { parseProgress } from '../src/progress/ProgressParser';

describe('parseProgress', () => {
  it('reads percent and byte counts from client progress lines', () => {
    expect(
      parseProgress(' Update state (0x61) downloading, progress: 45.23 (1234 / 5678)'),
    ).toEqual({ percent: 45.23, bytesDone: 1234, bytesTotal: 5678 });
  });

  it('falls back to a bare percentage', () => {
    expect(parseProgress(' 45% 12 + data/file.pak')).toEqual({ percent: 45 });
  });

  it('takes the last percentage when several updates share a line', () => {
    expect(parseProgress('10%\b\b\b 20%\b\b\b 30%')).toEqual({ percent: 30 });
  });

  it('clamps percentages above 100', () => {
    expect(parseProgress('150%')).toEqual({ percent: 100 });
  });

  it('returns null for lines without progress', () => {
    expect(parseProgress('Success! App fully installed.')).toBeNull();
    expect(parseProgress('')).toBeNull();
  });

  it('extracts every well-formed byte progress line', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 100 }),
        fc.integer({ min: 1, max: 1_000_000_000 }),
        fc.integer({ min: 0, max: 1_000_000_000 }),
        (percent, total, done) => {
          const line = `Update state (0x61) downloading, progress: ${percent}.00 (${done} / ${total})`;
          expect(parseProgress(line)).toEqual({
            percent,
            bytesDone: done,
            bytesTotal: total,
          });
        },
      ),
      { numRuns: 100 },
    );
  });

  it('never reports a percentage outside 0..100', () => {
    fc.assert(
      fc.property(fc.string(), (line) => {
        const sample = parseProgress(line);
        if (sample) {
          expect(sample.percent).toBeGreaterThanOrEqual(0);
          expect(sample.percent).toBeLessThanOrEqual(100);
        }
      }),
      { numRuns: 200 },
    );
  });
});
