import { createTimestampTerms, encodeSingleExecution } from '@caveatkit/delegation-core';
import { pino } from 'pino';
import { spy } from 'sinon';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getLogger, setLogger } from '../src/logger';
import {
  createAccount,
  createHookParams,
  createSignedDelegation,
  createTestFramework,
  deployCounter,
} from './utils';

type LogRecord = Record<string, unknown>;

describe('logger', () => {
  const original = getLogger();
  let records: LogRecord[];

  beforeEach(() => {
    records = [];
    setLogger(
      pino(
        { level: 'debug' },
        {
          write: (line: string) => {
            records.push(JSON.parse(line));
          },
        },
      ),
    );
  });

  afterEach(() => {
    setLogger(original);
  });

  it('should scope loggers to a component', () => {
    getLogger('TestComponent').info({ value: 1 }, 'hello');

    expect(records).to.have.length(1);
    expect(records[0]).to.include({
      component: 'TestComponent',
      value: 1,
      msg: 'hello',
      level: 30,
    });
  });

  it('should not bind a component to the root logger', () => {
    getLogger().warn('root');

    expect(records[0]).to.not.have.property('component');
  });

  it('should log rejected caveats at debug level', () => {
    const { enforcers, clock } = createTestFramework();
    clock.setTimestamp(3_000n);

    expect(() =>
      enforcers.TimestampEnforcer.beforeHook(
        createHookParams({
          terms: createTimestampTerms({
            timestampAfterThreshold: 0n,
            timestampBeforeThreshold: 2_000n,
          }),
        }),
      ),
    ).to.throw('TimestampEnforcer:expired-delegation');

    const rejection = records.find(
      ({ msg }) => msg === 'caveat rejected execution',
    );
    expect(rejection).to.include({
      component: 'TimestampEnforcer',
      reason: 'expired-delegation',
      code: 'ExpiredDelegation',
      level: 20,
    });
  });

  it('should warn when a redemption fails', () => {
    const framework = createTestFramework();
    const alice = createAccount(framework, 'alice');
    const bob = createAccount(framework, 'bob');
    const carol = createAccount(framework, 'carol');
    const counter = deployCounter(framework.runtime);

    const delegation = createSignedDelegation({ from: alice, to: bob.address });

    expect(() =>
      framework.manager.redeemDelegations({
        caller: carol.address,
        permissionContexts: [[delegation]],
        modes: ['0x0000000000000000000000000000000000000000000000000000000000000000'],
        executionCallDatas: [
          encodeSingleExecution({ target: counter.address, value: 0n, callData: '0x' }),
        ],
      }),
    ).to.throw('DelegationManager:InvalidDelegate');

    const failure = records.find(({ msg }) => msg === 'redemption failed');
    expect(failure).to.include({
      component: 'DelegationManager',
      redeemer: carol.address,
      level: 40,
    });
    expect(String(failure?.reason)).to.contain('DelegationManager:InvalidDelegate');
  });

  it('should write through a custom destination', () => {
    const write = spy();
    setLogger(pino({ level: 'info' }, { write }));

    getLogger('Spy').info('one');
    getLogger('Spy').debug('filtered');

    expect(write.callCount).to.equal(1);
  });
});
