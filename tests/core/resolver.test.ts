/**
 * Tests for the configuration resolver
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { resolve } from '../../src/core/resolver.js';
import type { DependencySpec, EnvironmentRule, PlatformGroups } from '../../src/types/index.js';
import {
  MissingTemplateSourceError,
  UnresolvedExternalDependencyError,
  ValidationError
} from '../../src/utils/errors.js';

function groups(
  base: DependencySpec[],
  macos: DependencySpec[],
  linux: DependencySpec[]
): PlatformGroups {
  return {
    base: { name: 'base', condition: 'always', members: base },
    macos: { name: 'macos', condition: 'macos-only', members: macos },
    linux: { name: 'linux', condition: 'linux-only', members: linux }
  };
}

const LIBRARY_RULES: EnvironmentRule[] = [
  {
    kind: 'pathList',
    name: 'APPEND_LIBRARY_PATH',
    segments: { linux: ['/a/lib', '/b/lib'] },
    append: false
  },
  {
    kind: 'pathList',
    name: 'LD_LIBRARY_PATH',
    segments: { always: [{ from: 'APPEND_LIBRARY_PATH' }] },
    append: true
  }
];

describe('resolve', () => {
  describe('dependency set', () => {
    const declared = groups(['A', 'B'], ['C'], ['D', 'E']);

    it('appends the macOS group on macos', () => {
      assert.deepEqual(resolve('macos', declared).dependencies, ['A', 'B', 'C']);
    });

    it('appends the Linux group on linux', () => {
      assert.deepEqual(resolve('linux', declared).dependencies, ['A', 'B', 'D', 'E']);
    });

    it('uses only the base group on other platforms', () => {
      assert.deepEqual(resolve('other', declared).dependencies, ['A', 'B']);
    });

    it('yields an empty set when every group is empty', () => {
      for (const platform of ['macos', 'linux', 'other']) {
        assert.deepEqual(resolve(platform, groups([], [], [])).dependencies, []);
      }
    });

    it('keeps declared order and duplicates across groups', () => {
      const result = resolve('linux', groups(['zlib', 'cmake'], [], ['zlib']));
      assert.deepEqual(result.dependencies, ['zlib', 'cmake', 'zlib']);
    });

    it('selects groups by their condition', () => {
      const tagged: PlatformGroups = {
        base: { name: 'base', condition: 'always', members: ['A'] },
        macos: { name: 'macos', condition: 'always', members: ['B'] },
        linux: { name: 'linux', condition: 'linux-only', members: ['C'] }
      };
      assert.deepEqual(resolve('other', tagged).dependencies, ['A', 'B']);
      assert.deepEqual(resolve('linux', tagged).dependencies, ['A', 'B', 'C']);
    });

    it('reports the parsed platform', () => {
      assert.equal(resolve('linux', declared).platform, 'linux');
    });
  });

  describe('platform validation', () => {
    it('fails with UnknownPlatform naming the value', () => {
      assert.throws(
        () => resolve('windows', groups(['A'], [], [])),
        {
          name: 'UnknownPlatformError',
          code: 'UNKNOWN_PLATFORM',
          message: "Unknown platform 'windows': expected one of macos, linux, other"
        }
      );
    });

    it('accepts case and surrounding whitespace variations', () => {
      assert.equal(resolve(' MacOS ', groups([], [], [])).platform, 'macos');
    });
  });

  describe('environment rules', () => {
    it('copies literal values', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [{ kind: 'literal', name: 'LLVM_SYS_100_PREFIX', value: '/opt/llvm-10' }]
      });
      assert.deepEqual(environment, { LLVM_SYS_100_PREFIX: '/opt/llvm-10' });
    });

    it('substitutes an earlier value into a template', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [
          { kind: 'literal', name: 'PREFIX', value: '/opt/llvm' },
          { kind: 'template', name: 'LLVM_CONFIG', template: '${PREFIX}/bin/llvm-config' }
        ]
      });
      assert.equal(environment.LLVM_CONFIG, '/opt/llvm/bin/llvm-config');
    });

    it('fails with MissingTemplateSource when the source comes later', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), {
          rules: [
            { kind: 'template', name: 'LLVM_CONFIG', template: '${PREFIX}/bin/llvm-config' },
            { kind: 'literal', name: 'PREFIX', value: '/opt/llvm' }
          ]
        }),
        (error: unknown) => {
          assert.ok(error instanceof MissingTemplateSourceError);
          assert.deepEqual(error.details, { rule: 'LLVM_CONFIG', source: 'PREFIX' });
          return true;
        }
      );
    });

    it('does not read template sources from the host environment', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), {
          rules: [{ kind: 'template', name: 'GREETING', template: 'hello ${USER}' }],
          priorEnv: { USER: 'dev' }
        }),
        { code: 'MISSING_TEMPLATE_SOURCE' }
      );
    });

    it('rejects templates without exactly one placeholder', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), {
          rules: [
            { kind: 'literal', name: 'A', value: 'a' },
            { kind: 'template', name: 'B', template: '${A}-${A}' }
          ]
        }),
        ValidationError
      );
    });

    it('fails with MissingTemplateSource for a path segment referencing an unknown rule', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), { rules: [LIBRARY_RULES[1]] }),
        { name: 'MissingTemplateSourceError', message: /'LD_LIBRARY_PATH' references 'APPEND_LIBRARY_PATH'/ }
      );
    });

    it('appends a fixed directory after the prior PATH', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [{ kind: 'pathList', name: 'PATH', segments: { always: ['/extra/bin'] }, append: true }],
        priorEnv: { PATH: '/usr/bin' }
      });
      assert.equal(environment.PATH, '/usr/bin:/extra/bin');
    });

    it('resolves relative segments against the working directory', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [{ kind: 'pathList', name: 'PATH', segments: { always: [{ relative: 'nix/bin' }] }, append: true }],
        priorEnv: { PATH: '/usr/bin' },
        workingDirectory: '/work'
      });
      assert.equal(environment.PATH, '/usr/bin:/work/nix/bin');
    });

    it('requires a working directory for relative segments', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), {
          rules: [{ kind: 'pathList', name: 'PATH', segments: { always: [{ relative: 'nix/bin' }] }, append: true }]
        }),
        ValidationError
      );
    });

    it('uses only the joined segments when there is no prior value', () => {
      const { environment } = resolve('linux', groups([], [], []), { rules: LIBRARY_RULES });
      assert.deepEqual(environment, {
        APPEND_LIBRARY_PATH: '/a/lib:/b/lib',
        LD_LIBRARY_PATH: '/a/lib:/b/lib'
      });
    });

    it('appends to a prior value without overwriting it', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: LIBRARY_RULES,
        priorEnv: { LD_LIBRARY_PATH: '/usr/lib' }
      });
      assert.equal(environment.LD_LIBRARY_PATH, '/usr/lib:/a/lib:/b/lib');
    });

    it('ignores prior values for rules that do not append', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: LIBRARY_RULES,
        priorEnv: { APPEND_LIBRARY_PATH: '/stale/lib' }
      });
      assert.equal(environment.APPEND_LIBRARY_PATH, '/a/lib:/b/lib');
    });

    it('leaves the library path empty on macOS', () => {
      const { environment } = resolve('macos', groups([], [], []), {
        rules: LIBRARY_RULES,
        priorEnv: { LD_LIBRARY_PATH: '/usr/lib' }
      });
      assert.deepEqual(environment, {
        APPEND_LIBRARY_PATH: '',
        LD_LIBRARY_PATH: '/usr/lib'
      });
    });

    it('honours a custom separator', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: LIBRARY_RULES,
        priorEnv: { LD_LIBRARY_PATH: 'C:\\lib' },
        separator: ';'
      });
      assert.equal(environment.LD_LIBRARY_PATH, 'C:\\lib;/a/lib;/b/lib');
    });

    it('keeps rule order in the resolved environment', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [
          { kind: 'literal', name: 'Z', value: 'z' },
          ...LIBRARY_RULES,
          { kind: 'literal', name: 'A', value: 'a' }
        ]
      });
      assert.deepEqual(Object.keys(environment), ['Z', 'APPEND_LIBRARY_PATH', 'LD_LIBRARY_PATH', 'A']);
    });
  });

  describe('package segments', () => {
    const rules: EnvironmentRule[] = [
      { kind: 'pathList', name: 'LLVM_PREFIX', segments: { always: [{ package: 'llvmPackages_10.llvm' }] }, append: false },
      {
        kind: 'pathList',
        name: 'LIBRARY_PATH',
        segments: { linux: [{ package: 'libunwind', subdir: 'lib' }, { package: 'zlib', subdir: 'lib/x86' }] },
        append: false
      }
    ];
    const packageLocations = {
      'llvmPackages_10.llvm': '/store/aaa-llvm-10.0.1',
      libunwind: '/store/bbb-libunwind-10.0.1',
      zlib: '/store/ccc-zlib-1.2.11'
    };

    it('renders located package directories', () => {
      const { environment } = resolve('linux', groups([], [], []), { rules, packageLocations });
      assert.deepEqual(environment, {
        LLVM_PREFIX: '/store/aaa-llvm-10.0.1',
        LIBRARY_PATH: '/store/bbb-libunwind-10.0.1/lib:/store/ccc-zlib-1.2.11/lib/x86'
      });
    });

    it('fails with UnresolvedExternalDependency for a package that was not located', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), { rules, packageLocations: { 'llvmPackages_10.llvm': '/store/llvm' } }),
        (error: unknown) => {
          assert.ok(error instanceof UnresolvedExternalDependencyError);
          assert.deepEqual(error.details, { dependency: 'libunwind', repository: 'the located packages' });
          return true;
        }
      );
    });

    it('does not take package locations from inherited members', () => {
      assert.throws(
        () => resolve('linux', groups([], [], []), {
          rules: [{ kind: 'pathList', name: 'P', segments: { always: [{ package: 'toString' }] }, append: false }],
          packageLocations: {}
        }),
        { code: 'UNRESOLVED_EXTERNAL_DEPENDENCY' }
      );
    });
  });

  describe('names that shadow object members', () => {
    it('ignores inherited members of the prior environment', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [{ kind: 'pathList', name: 'constructor', segments: { always: ['/x'] }, append: true }],
        priorEnv: process.env
      });
      assert.equal(environment.constructor, '/x');
    });

    it('still appends to an own prior value of the same name', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [{ kind: 'pathList', name: 'toString', segments: { always: ['/x'] }, append: true }],
        priorEnv: { toString: '/usr/bin' }
      });
      assert.equal(environment.toString, '/usr/bin:/x');
    });

    it('keeps a rule named __proto__ as an ordinary variable', () => {
      const { environment } = resolve('linux', groups([], [], []), {
        rules: [
          { kind: 'literal', name: '__proto__', value: '/a' },
          { kind: 'pathList', name: 'B', segments: { always: [{ from: '__proto__' }] }, append: false }
        ]
      });

      assert.equal(environment.B, '/a');
      assert.deepEqual(Object.keys(environment), ['__proto__', 'B']);
      assert.equal(Object.getOwnPropertyDescriptor(environment, '__proto__')?.value, '/a');
    });
  });

  describe('determinism', () => {
    it('returns identical output for identical input', () => {
      const declared = groups(['A'], ['B'], ['C']);
      const options = { rules: LIBRARY_RULES, priorEnv: { LD_LIBRARY_PATH: '/usr/lib' } };
      for (const platform of ['macos', 'linux', 'other']) {
        const first = resolve(platform, declared, options);
        const second = resolve(platform, declared, options);
        assert.equal(JSON.stringify(first), JSON.stringify(second));
      }
    });

    it('appends once per call when outputs are chained', () => {
      const declared = groups([], [], []);
      let prior: string | undefined;

      for (let call = 0; call < 3; call++) {
        prior = resolve('linux', declared, {
          rules: LIBRARY_RULES,
          priorEnv: { LD_LIBRARY_PATH: prior }
        }).environment.LD_LIBRARY_PATH;
      }

      assert.equal(prior, '/a/lib:/b/lib:/a/lib:/b/lib:/a/lib:/b/lib');
    });

    it('freezes the resolution', () => {
      const result = resolve('linux', groups(['A'], [], []), { rules: LIBRARY_RULES });
      assert.ok(Object.isFrozen(result));
      assert.ok(Object.isFrozen(result.dependencies));
      assert.ok(Object.isFrozen(result.environment));
    });
  });
});
