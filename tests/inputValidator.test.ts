import fc from 'fast-check';
import {
  CredentialsSchema,
  DownloadRequestSchema,
  InputValidator,
} from '../src/utils/InputValidator';

describe('InputValidator', () => {
  describe('sanitizeText', () => {
    it('rejects empty or whitespace-only strings', () => {
      for (const input of ['', '   ', '\t\t', '\n\n', undefined]) {
        expect(InputValidator.sanitizeText(input)).toBeNull();
      }
    });

    it('enforces the maximum length', () => {
      fc.assert(
        fc.property(
          fc.string({ minLength: 1 }),
          fc.integer({ min: 1, max: 1000 }),
          (input, maxLength) => {
            const result = InputValidator.sanitizeText(input, maxLength);
            if (result !== null) {
              expect(result.length).toBeLessThanOrEqual(maxLength);
            }
          },
        ),
        { numRuns: 100 },
      );
    });

    it('removes control characters except newlines and tabs', () => {
      expect(InputValidator.sanitizeText('a\x00b\x07c\td\ne')).toBe('abc\td\ne');
    });
  });

  describe('extractContentId', () => {
    it('accepts a bare numeric id', () => {
      expect(InputValidator.extractContentId('440')).toBe('440');
      expect(InputValidator.extractContentId('  570  ')).toBe('570');
    });

    it('extracts the id from a store URL', () => {
      expect(
        InputValidator.extractContentId('https://store.example.com/app/440/Some_Title/'),
      ).toBe('440');
      expect(InputValidator.extractContentId('store.example.com/app/1091500')).toBe('1091500');
    });

    it('extracts the id from any store-style URL', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 1, max: Number.MAX_SAFE_INTEGER }),
          fc.stringMatching(/^[A-Za-z0-9_]{0,20}$/),
          (id, title) => {
            const url = `https://store.example.com/app/${id}/${title}`;
            expect(InputValidator.extractContentId(url)).toBe(String(id));
          },
        ),
        { numRuns: 100 },
      );
    });

    it('returns null when there is no id', () => {
      expect(InputValidator.extractContentId('https://store.example.com/search')).toBeNull();
      expect(InputValidator.extractContentId('not a game')).toBeNull();
      expect(InputValidator.extractContentId('')).toBeNull();
    });
  });

  describe('isOutputPathSafe', () => {
    it('accepts absolute paths', () => {
      expect(InputValidator.isOutputPathSafe('/data/output/game.7z')).toBe(true);
    });

    it('rejects relative paths and traversal', () => {
      expect(InputValidator.isOutputPathSafe('output/game.7z')).toBe(false);
      expect(InputValidator.isOutputPathSafe('/data/../etc/game.7z')).toBe(false);
      expect(InputValidator.isOutputPathSafe('')).toBe(false);
    });
  });
});

describe('CredentialsSchema', () => {
  it('parses anonymous credentials', () => {
    expect(CredentialsSchema.parse({ anonymous: true })).toEqual({ anonymous: true });
  });

  it('parses a username and password', () => {
    expect(
      CredentialsSchema.parse({ username: ' player ', password: 'test-secret', guardCode: 'ABCDE' }),
    ).toEqual({
      anonymous: false,
      username: 'player',
      password: 'test-secret',
      guardCode: 'ABCDE',
    });
  });

  it('drops an empty guard code', () => {
    const credentials = CredentialsSchema.parse({
      username: 'player',
      password: 'test-secret',
      guardCode: '  ',
    });
    expect(credentials).toEqual({
      anonymous: false,
      username: 'player',
      password: 'test-secret',
    });
  });

  it('requires both username and password unless anonymous', () => {
    expect(CredentialsSchema.safeParse({ username: 'player' }).success).toBe(false);
    expect(CredentialsSchema.safeParse({ password: 'test-secret' }).success).toBe(false);
    expect(CredentialsSchema.safeParse({}).success).toBe(false);
  });
});

describe('DownloadRequestSchema', () => {
  it('defaults resume to false', () => {
    expect(
      DownloadRequestSchema.parse({
        source: '440',
        outputPath: '/data/output/game.7z',
        credentials: { anonymous: true },
      }),
    ).toEqual({
      source: '440',
      outputPath: '/data/output/game.7z',
      resume: false,
      credentials: { anonymous: true },
    });
  });

  it('rejects a missing source', () => {
    expect(
      DownloadRequestSchema.safeParse({
        source: '  ',
        outputPath: '/data/output/game.7z',
        credentials: { anonymous: true },
      }).success,
    ).toBe(false);
  });
});
