import { describe, it, expect } from 'vitest';

import { platformInfo } from '../compiler/detectPlatform.js';
import { staticEnvironment } from './environment.js';

describe('staticEnvironment', () => {
  it('treats empty variables as unset', () => {
    const env = staticEnvironment({ vars: { GRAALVM_HOME: '', PATH: '/usr/bin' } });
    expect(env.get('GRAALVM_HOME')).toBeUndefined();
    expect(env.get('PATH')).toBe('/usr/bin');
  });

  it('reads the search path from CLASSPATH', () => {
    const env = staticEnvironment({ vars: { CLASSPATH: 'a:b' } });
    expect(env.searchPath()).toBe('a:b');
    expect(staticEnvironment().searchPath()).toBe('');
  });

  it('reports the pinned platform', () => {
    const env = staticEnvironment({ platform: platformInfo('win32', 'x64') });
    expect(env.platform().isWindows).toBe(true);
    expect(env.platform().pathDelimiter).toBe(';');
  });
});
