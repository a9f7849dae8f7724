// SPDX-License-Identifier: Apache-2.0

import { ConfigKey } from '@leaselock/config-service';

type EnvOverrides = Partial<Record<ConfigKey, string | number | boolean | undefined>>;

function applyEnvs(envs: EnvOverrides): Record<string, string | undefined> {
  const previous: Record<string, string | undefined> = {};
  for (const [name, value] of Object.entries(envs)) {
    previous[name] = process.env[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = String(value);
    }
  }
  return previous;
}

function restoreEnvs(previous: Record<string, string | undefined>): void {
  for (const [name, value] of Object.entries(previous)) {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
}

/**
 * Overrides environment variables for every test of the enclosing describe block.
 */
export const overrideEnvsInMochaDescribe = (envs: EnvOverrides): void => {
  let previous: Record<string, string | undefined> = {};

  before(() => {
    previous = applyEnvs(envs);
  });

  after(() => {
    restoreEnvs(previous);
  });
};

/**
 * Runs the tests declared in `tests` in their own describe block with the given environment overrides.
 */
export const withOverriddenEnvsInMochaTest = (envs: EnvOverrides, tests: () => void): void => {
  const description = Object.entries(envs)
    .map(([name, value]) => `${name}=${String(value)}`)
    .join(', ');

  describe(`given ${description}`, () => {
    overrideEnvsInMochaDescribe(envs);
    tests();
  });
};

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
