import { describe, expect, it } from 'vitest';
import type { OptionMap } from '../validate/values.js';
import { addQuorumDevice, updateQuorumDevice, type QuorumDeviceOptions } from './qdevice.js';

function device(
  parts: {
    modelOptions?: OptionMap;
    genericOptions?: OptionMap;
    heuristicsOptions?: OptionMap;
  } = {}
): QuorumDeviceOptions {
  return {
    modelOptions: parts.modelOptions ?? { host: 'qnetd.test', algorithm: 'ffsplit' },
    genericOptions: parts.genericOptions ?? {},
    heuristicsOptions: parts.heuristicsOptions ?? {},
    nodeIds: ['1', '2'],
  };
}

describe('addQuorumDevice', () => {
  it('should accept a complete net device', () => {
    const reports = addQuorumDevice(
      'net',
      device({
        modelOptions: {
          host: 'qnetd.test',
          algorithm: 'lms',
          connect_timeout: '5000',
          force_ip_version: '4',
          port: '5403',
          tie_breaker: '2',
        },
        genericOptions: { timeout: '10000', sync_timeout: '30000' },
        heuristicsOptions: { mode: 'sync', exec_ping: '/usr/bin/ping -c 1 gw.test', interval: '30' },
      })
    );
    expect(reports).toEqual([]);
  });

  it('should require host and algorithm', () => {
    const reports = addQuorumDevice('net', device({ modelOptions: {} }));
    expect(reports.map((item) => item.payload)).toEqual([
      { optionNames: ['algorithm'], optionType: 'quorum device model' },
      { optionNames: ['host'], optionType: 'quorum device model' },
    ]);
  });

  it('should never allow forcing an empty algorithm', () => {
    const reports = addQuorumDevice(
      'net',
      device({ modelOptions: { host: 'qnetd.test', algorithm: '' } }),
      { forceOptions: true }
    );
    expect(reports).toEqual([
      {
        kind: 'InvalidOptionValue',
        severity: 'ERROR',
        forceCode: null,
        payload: { optionName: 'algorithm', optionValue: '', allowedValues: ['ffsplit', 'lms'] },
      },
    ]);
  });

  it('should make an unknown algorithm forceable', () => {
    const modelOptions = { host: 'qnetd.test', algorithm: '2nodelms' };
    expect(addQuorumDevice('net', device({ modelOptions }))[0]).toMatchObject({
      severity: 'ERROR',
      forceCode: 'FORCE_OPTIONS',
    });
    expect(addQuorumDevice('net', device({ modelOptions }), { forceOptions: true })[0]).toMatchObject({
      severity: 'WARNING',
      forceCode: null,
    });
  });

  it('should accept node ids as tie breakers', () => {
    const [item] = addQuorumDevice(
      'net',
      device({ modelOptions: { host: 'qnetd.test', algorithm: 'ffsplit', tie_breaker: '3' } })
    );
    expect(item?.payload).toEqual({
      optionName: 'tie_breaker',
      optionValue: '3',
      allowedValues: ['lowest', 'highest', '1', '2'],
    });
  });

  it('should report unknown model option names as forceable', () => {
    const [item] = addQuorumDevice(
      'net',
      device({ modelOptions: { host: 'qnetd.test', algorithm: 'ffsplit', votes: '1' } })
    );
    expect(item).toEqual({
      kind: 'InvalidOptionName',
      severity: 'ERROR',
      forceCode: 'FORCE_OPTIONS',
      payload: {
        optionNames: ['votes'],
        allowed: ['algorithm', 'connect_timeout', 'force_ip_version', 'host', 'port', 'tie_breaker'],
        optionType: 'quorum device model',
        allowedPatterns: [],
      },
    });
  });

  it('should make an unknown model forceable and skip its options', () => {
    const modelOptions = { anything: 'goes' };
    expect(addQuorumDevice('disk', device({ modelOptions }))).toEqual([
      {
        kind: 'InvalidOptionValue',
        severity: 'ERROR',
        forceCode: 'FORCE_QDEVICE_MODEL',
        payload: { optionName: 'model', optionValue: 'disk', allowedValues: ['net'] },
      },
    ]);
    expect(addQuorumDevice('disk', device({ modelOptions }), { forceModel: true })).toEqual([
      {
        kind: 'InvalidOptionValue',
        severity: 'WARNING',
        forceCode: null,
        payload: { optionName: 'model', optionValue: 'disk', allowedValues: ['net'] },
      },
    ]);
  });

  it('should refuse the model as a generic option without a force code', () => {
    const reports = addQuorumDevice(
      'net',
      device({ genericOptions: { model: 'net', timeout: '0', votes: '1' } })
    );
    expect(reports.map((item) => [item.kind, item.forceCode, item.payload])).toEqual([
      [
        'InvalidOptionValue',
        'FORCE_OPTIONS',
        { optionName: 'timeout', optionValue: '0', allowedValues: 'a positive integer' },
      ],
      [
        'InvalidOptionName',
        null,
        {
          optionNames: ['model'],
          allowed: ['sync_timeout', 'timeout'],
          optionType: 'quorum device',
          allowedPatterns: [],
        },
      ],
      [
        'InvalidOptionName',
        'FORCE_OPTIONS',
        {
          optionNames: ['votes'],
          allowed: ['sync_timeout', 'timeout'],
          optionType: 'quorum device',
          allowedPatterns: [],
        },
      ],
    ]);
  });

  it('should check heuristics values, names and exec names', () => {
    const reports = addQuorumDevice(
      'net',
      device({
        heuristicsOptions: {
          mode: 'on',
          'exec_check.sh': 'true',
          interval: 'often',
          exec_ok: '/bin/true',
          retries: '3',
        },
      })
    );
    expect(reports.map((item) => [item.kind, item.forceCode, item.payload])).toEqual([
      [
        'InvalidOptionValue',
        'FORCE_OPTIONS',
        { optionName: 'interval', optionValue: 'often', allowedValues: 'a positive integer' },
      ],
      [
        'InvalidOptionName',
        'FORCE_OPTIONS',
        {
          optionNames: ['retries'],
          allowed: ['interval', 'mode', 'sync_timeout', 'timeout'],
          optionType: 'heuristics',
          allowedPatterns: ['exec_NAME'],
        },
      ],
      [
        'InvalidUserdefinedOptionName',
        null,
        {
          optionNames: ['exec_check.sh'],
          allowedDescription: "exec_NAME cannot contain '.:{}#' and whitespace characters",
          optionType: 'heuristics',
        },
      ],
    ]);
  });

  it('should require a command for exec options', () => {
    const reports = addQuorumDevice('net', device({ heuristicsOptions: { exec_ping: '' } }));
    expect(reports).toEqual([
      {
        kind: 'InvalidOptionValue',
        severity: 'ERROR',
        forceCode: null,
        payload: { optionName: 'exec_ping', optionValue: '', allowedValues: 'a command to be run' },
      },
    ]);
  });
});

describe('updateQuorumDevice', () => {
  it('should not require host and algorithm', () => {
    expect(updateQuorumDevice('net', device({ modelOptions: { port: '5404' } }))).toEqual([]);
  });

  it('should unset optional options with empty values', () => {
    const reports = updateQuorumDevice(
      'net',
      device({
        modelOptions: { port: '', tie_breaker: '' },
        genericOptions: { timeout: '' },
        heuristicsOptions: { mode: '', exec_ping: '' },
      })
    );
    expect(reports).toEqual([]);
  });

  it('should refuse an empty host', () => {
    const [item] = updateQuorumDevice('net', device({ modelOptions: { host: '' } }));
    expect(item?.payload).toEqual({
      optionName: 'host',
      optionValue: '',
      allowedValues: 'a qdevice host address',
    });
  });

  it('should skip model options of a model without validation', () => {
    expect(updateQuorumDevice('disk', device({ modelOptions: { anything: 'goes' } }))).toEqual([]);
  });
});
