import { EtlConfig, parseAssetList, parseDayWindow } from '@/config/etl.config';
import { parseCliArgs } from '@/cli';
import { STORAGE_TYPES } from '@/constants/market';
import { ValidationError } from '@/errors';

describe('parseAssetList', () => {
  it('should trim, lowercase and drop blank entries', () => {
    expect(parseAssetList(' Bitcoin, ,ethereum ,')).toEqual(['bitcoin', 'ethereum']);
  });

  it('should return an empty list for an empty value', () => {
    expect(parseAssetList('')).toEqual([]);
  });
});

describe('parseDayWindow', () => {
  it.each([
    ['365', 365],
    [' 30 ', 30],
    ['max', 'max'],
  ])('should parse "%s"', (value, expected) => {
    expect(parseDayWindow(value)).toBe(expected);
  });

  it.each(['0', '-5', '1.5', 'forever'])('should reject "%s"', (value) => {
    expect(() => parseDayWindow(value)).toThrow(ValidationError);
  });
});

describe('parseCliArgs', () => {
  const base: EtlConfig = {
    assetIds: ['bitcoin'],
    quoteCurrency: 'usd',
    window: 365,
    storageType: STORAGE_TYPES.CSV,
    pricesPath: 'data/crypto_prices.csv',
    metadataPath: 'data/coin_metadata.csv',
  };

  it('should keep the environment configuration when no flags are given', () => {
    expect(parseCliArgs([], base)).toEqual({ config: base, top: undefined });
  });

  it('should override assets, window and quote currency', () => {
    const { config } = parseCliArgs(['--assets', 'Solana,cardano', '--days', 'max', '--vs', 'EUR'], base);

    expect(config).toEqual({
      ...base,
      assetIds: ['solana', 'cardano'],
      window: 'max',
      quoteCurrency: 'eur',
    });
  });

  it('should not mutate the base configuration', () => {
    parseCliArgs(['--assets', 'solana'], base);

    expect(base.assetIds).toEqual(['bitcoin']);
  });

  it('should build an explicit range from --from and --to', () => {
    const { config } = parseCliArgs(['--from', '2024-01-01', '--to', '2024-06-30'], base);

    expect(config.window).toEqual({
      from: new Date('2024-01-01T00:00:00.000Z'),
      to: new Date('2024-06-30T00:00:00.000Z'),
    });
  });

  it('should accept --top on its own', () => {
    expect(parseCliArgs(['--top', '10'], base).top).toBe(10);
  });

  it.each([
    ['--days with a range', ['--days', '30', '--from', '2024-01-01', '--to', '2024-02-01']],
    ['--from without --to', ['--from', '2024-01-01']],
    ['an invalid date', ['--from', 'yesterday', '--to', '2024-02-01']],
    ['--top with --assets', ['--top', '5', '--assets', 'bitcoin']],
    ['--top out of range', ['--top', '500']],
    ['--top that is not a number', ['--top', 'ten']],
  ])('should reject %s', (_label, argv) => {
    expect(() => parseCliArgs(argv, base)).toThrow(ValidationError);
  });

  it('should reject unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'], base)).toThrow();
  });
});
