// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';

import { BlockQueryError, BlockQueryErrorKind } from '../src';

/**
 * Temporarily overrides environment variables for the duration of the enclosing
 * mocha `describe`. An `undefined` value unsets the variable.
 *
 * @param envs - the variables to override
 */
export const overrideEnvsInMochaDescribe = (envs: NodeJS.Dict<string>): void => {
  const envsToReset: NodeJS.Dict<string> = {};

  const overrideEnv = (object: NodeJS.Dict<string>, key: string, value: string | undefined): void => {
    if (value === undefined) {
      delete object[key];
    } else {
      object[key] = value;
    }
  };

  before(() => {
    for (const key of Object.keys(envs)) {
      envsToReset[key] = process.env[key];
      overrideEnv(process.env, key, envs[key]);
    }
  });

  after(() => {
    for (const key of Object.keys(envs)) {
      overrideEnv(process.env, key, envsToReset[key]);
    }
  });
};

/**
 * Runs `tests` inside a `describe` that overrides the given environment variables.
 *
 * @example
 * withOverriddenEnvsInMochaTest({ FINALITY_DEPTH: '10' }, () => {
 *   it('uses the overridden depth', () => { ... });
 * });
 */
export const withOverriddenEnvsInMochaTest = (envs: NodeJS.Dict<string>, tests: () => void): void => {
  const overriddenEnvs = Object.entries(envs)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');

  describe(`given ${overriddenEnvs} are set`, () => {
    overrideEnvsInMochaDescribe(envs);
    tests();
  });
};

/**
 * Awaits a promise expected to reject with a {@link BlockQueryError} of the given kind
 * and returns the error for further assertions.
 */
export const expectBlockQueryError = async (
  promise: Promise<unknown>,
  kind: BlockQueryErrorKind,
): Promise<BlockQueryError> => {
  try {
    await promise;
  } catch (e) {
    expect(e).to.be.instanceOf(BlockQueryError);
    if (!(e instanceof BlockQueryError)) throw e;
    expect(e.kind).to.eq(kind);
    return e;
  }
  expect.fail(`expected a ${kind} error`);
};
