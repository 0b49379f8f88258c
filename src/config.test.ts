import { DEFAULT_CONFIG, loadConfig, resolveEnv } from './config';

describe('loadConfig', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
    Reflect.deleteProperty(globalThis, 'importMeta');
  });

  it('falls back to defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads precision and flags from the environment', () => {
    expect(
      loadConfig({
        VITE_DISPLAY_PRECISION: '1',
        VITE_ENABLE_ANALYTICS: 'false',
        VITE_DEBUG_RECOMPUTE: 'TRUE',
      })
    ).toEqual({
      displayPrecision: 1,
      analyticsEnabled: false,
      debugRecompute: true,
    });
  });

  it.each(['-1', '7', '1.5', 'two'])('ignores VITE_DISPLAY_PRECISION=%p', (raw) => {
    expect(loadConfig({ VITE_DISPLAY_PRECISION: raw }).displayPrecision).toBe(2);
    expect(warnSpy).toHaveBeenCalledWith(
      `Ignoring VITE_DISPLAY_PRECISION=${raw}; expected an integer from 0 to 6`
    );
  });

  it('keeps the default for unrecognised flag values', () => {
    expect(loadConfig({ VITE_ENABLE_ANALYTICS: 'maybe' }).analyticsEnabled).toBe(true);
  });

  it('prefers the env exposed by the Vite entry point', () => {
    Object.assign(globalThis, { importMeta: { env: { VITE_DISPLAY_PRECISION: '3' } } });

    expect(resolveEnv()).toEqual({ VITE_DISPLAY_PRECISION: '3' });
    expect(loadConfig().displayPrecision).toBe(3);
  });

  it('reads process.env under Node', () => {
    expect(resolveEnv()).toBe(process.env);
  });
});
