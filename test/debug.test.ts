import { dlog } from '@ramses-link/core';

describe('dlog', () => {
  const saved = process.env.DEBUG;
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => { });
  });

  afterEach(() => {
    log.mockRestore();
    if (saved === undefined) delete process.env.DEBUG;
    else process.env.DEBUG = saved;
  });

  test('is silent without DEBUG', () => {
    delete process.env.DEBUG;
    dlog('ramses:transport', 'write()');
    expect(log).not.toHaveBeenCalled();
  });

  test('prints listed namespaces only', () => {
    process.env.DEBUG = 'ramses:serial, ramses:transport';
    dlog('ramses:transport', 'write()', 3);
    dlog('ramses:gateway', 'stop()');
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[ramses:transport]', 'write()', 3);
  });

  test('a prefix wildcard enables every namespace under it', () => {
    process.env.DEBUG = 'ramses:*';
    dlog('ramses:packet', 'x');
    dlog('other:thing', 'y');
    expect(log.mock.calls).toEqual([['[ramses:packet]', 'x']]);
  });
});
