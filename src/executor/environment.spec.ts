import { envFlags, mergeEnv } from './environment';

describe('mergeEnv', () => {
  it('lets stage overrides win over defaults', () => {
    const defaults = { OUTPUT_FOLDER: '/output', YEAR: '2023' };
    const overrides = { YEAR: '2024', MONTH: '5' };

    expect(mergeEnv(defaults, overrides)).toEqual({
      OUTPUT_FOLDER: '/output',
      YEAR: '2024',
      MONTH: '5',
    });
  });

  it('never mutates its inputs', () => {
    const defaults = { A: '1', B: '2' };
    const overrides = { B: '3' };

    const merged = mergeEnv(defaults, overrides);
    merged.C = '4';

    expect(defaults).toEqual({ A: '1', B: '2' });
    expect(overrides).toEqual({ B: '3' });
  });

  it('returns an empty map for two empty inputs', () => {
    expect(mergeEnv({}, {})).toEqual({});
  });
});

describe('envFlags', () => {
  it('emits one flag per entry in key order', () => {
    expect(envFlags('--env', { ZONE: 'b', ALPHA: 'a', MID: 'm' })).toEqual([
      '--env',
      'ALPHA=a',
      '--env',
      'MID=m',
      '--env',
      'ZONE=b',
    ]);
  });

  it('produces the same flags whatever the insertion order', () => {
    expect(envFlags('--build-arg', { B: '2', A: '1' })).toEqual(
      envFlags('--build-arg', { A: '1', B: '2' }),
    );
  });

  it('keeps values containing = and spaces intact', () => {
    expect(envFlags('--env', { QUERY: 'a=b c' })).toEqual(['--env', 'QUERY=a=b c']);
  });
});
