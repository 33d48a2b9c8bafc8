import {
  LinkFilterChain,
  LinkExpander,
  MockStorageAdapter,
  LINK_EXPANSION_SENTINEL,
  compilePattern,
  isValidPattern,
  InvalidPatternError,
} from '../../src';

describe('LinkFilterChain', () => {
  let storage: MockStorageAdapter;
  let expand: jest.Mock<Promise<string>, [string]>;
  let chain: LinkFilterChain;

  beforeEach(() => {
    storage = new MockStorageAdapter();
    expand = jest.fn(async (url: string) => url);
    const expander: LinkExpander = { expand };
    chain = new LinkFilterChain(storage, expander);
  });

  describe('Substitution Rules', () => {
    it('should feed each rule the previous output', async () => {
      await storage.createFilter({ pattern: 'A', replacement: 'B' });
      await storage.createFilter({ pattern: 'B', replacement: 'C' });

      expect(await chain.apply('A')).toBe('C');
    });

    it('should follow the current rule order', async () => {
      await storage.createFilter({ pattern: 'A', replacement: 'B' });
      const second = await storage.createFilter({ pattern: 'B', replacement: 'C' });
      await storage.moveFilter(second.id, 'up');

      expect(await chain.apply('A')).toBe('B');
    });

    it('should replace every match and support group templates', async () => {
      await storage.createFilter({ pattern: '(\\d+)-(\\d+)', replacement: '$2-$1' });

      expect(await chain.apply('12-34 and 5-6')).toBe('34-12 and 6-5');
    });

    it('should delete matches when the replacement is empty', async () => {
      await storage.createFilter({ pattern: '\\?tag=[\\w-]+' });

      expect(await chain.apply('https://shop.example/item?tag=abc-21')).toBe(
        'https://shop.example/item',
      );
    });

    it('should skip a rule whose pattern does not compile', async () => {
      await storage.createFilter({ pattern: '(', replacement: 'x' });
      await storage.createFilter({ pattern: 'old', replacement: 'new' });

      expect(await chain.apply('old text')).toBe('new text');
    });
  });

  describe('Link Expansion Rules', () => {
    beforeEach(async () => {
      await storage.createFilter({
        pattern: 'https?://short\\.link/\\w+',
        replacement: LINK_EXPANSION_SENTINEL,
      });
    });

    it('should expand each distinct match once and replace every occurrence', async () => {
      expand.mockImplementation(async (url) =>
        url === 'https://short.link/abc' ? 'https://shop.example/dp/B000' : url,
      );

      const result = await chain.apply(
        'See https://short.link/abc and https://short.link/abc',
      );

      expect(result).toBe('See https://shop.example/dp/B000 and https://shop.example/dp/B000');
      expect(expand).toHaveBeenCalledTimes(1);
      expect(expand).toHaveBeenCalledWith('https://short.link/abc');
    });

    it('should leave the text unchanged when expansion returns the same url', async () => {
      expect(await chain.apply('Go https://short.link/xyz')).toBe('Go https://short.link/xyz');
    });

    it('should run later substitution rules on the expanded text', async () => {
      expand.mockResolvedValue('https://shop.example/dp/B000?tag=them-20');
      await storage.createFilter({ pattern: 'tag=[\\w-]+', replacement: 'tag=us-21' });

      expect(await chain.apply('https://short.link/q')).toBe(
        'https://shop.example/dp/B000?tag=us-21',
      );
    });
  });

  it('should return empty text without reading the rules', async () => {
    const spy = jest.spyOn(storage, 'listFilters');

    expect(await chain.apply('')).toBe('');
    expect(spy).not.toHaveBeenCalled();
  });

  it('should pass text through when there are no rules', async () => {
    expect(await chain.apply('plain text')).toBe('plain text');
  });
});

describe('Pattern validation', () => {
  it('should compile valid patterns with the global flag', () => {
    expect(compilePattern('a+').flags).toBe('g');
    expect(isValidPattern('\\b[A-Z]{6,}\\b')).toBe(true);
  });

  it('should reject invalid patterns', () => {
    expect(isValidPattern('([')).toBe(false);
    expect(() => compilePattern('([')).toThrow(InvalidPatternError);
  });
});
