import { describe, expect, it } from 'vitest';
import { createLinkListKnet, createLinkListUdp } from './links.js';

describe('createLinkListUdp', () => {
  it('should accept no links', () => {
    expect(createLinkListUdp([])).toEqual([]);
  });

  it('should accept valid options', () => {
    expect(
      createLinkListUdp([
        { bindnetaddr: '10.0.0.0', broadcast: '0', mcastaddr: '239.255.1.1', mcastport: '5405', ttl: '1' },
      ])
    ).toEqual([]);
  });

  it('should report invalid values and names', () => {
    const reports = createLinkListUdp([{ broadcast: '2', ttl: '256', extra: 'x' }]);
    expect(reports.map((item) => item.payload)).toEqual([
      { optionName: 'broadcast', optionValue: '2', allowedValues: ['0', '1'] },
      { optionName: 'ttl', optionValue: '256', allowedValues: '0..255' },
      {
        optionNames: ['extra'],
        allowed: ['bindnetaddr', 'broadcast', 'mcastaddr', 'mcastport', 'ttl'],
        optionType: 'link',
        allowedPatterns: [],
      },
    ]);
  });

  it('should reject a multicast address together with broadcast', () => {
    const reports = createLinkListUdp([{ broadcast: '1', mcastaddr: '239.255.1.1' }]);
    expect(reports).toEqual([
      { kind: 'BroadcastDisallowsMcastaddr', severity: 'ERROR', forceCode: null, payload: {} },
    ]);
  });

  it('should only check the first link and report the rest as too many', () => {
    const reports = createLinkListUdp([{}, { bogus: '1' }]);
    expect(reports).toEqual([
      {
        kind: 'TooManyLinks',
        severity: 'ERROR',
        forceCode: null,
        payload: { actualCount: 2, maxCount: 1, transport: 'udp/udpu' },
      },
    ]);
  });
});

describe('createLinkListKnet', () => {
  it('should accept no links', () => {
    expect(createLinkListKnet([], 0)).toEqual([]);
  });

  it('should accept valid options', () => {
    expect(
      createLinkListKnet(
        [
          { linknumber: '0', link_priority: '10', ping_interval: '1000', ping_timeout: '2000' },
          { linknumber: '1', transport: 'sctp', ip_version: 'ipv6', pong_count: '2' },
        ],
        1
      )
    ).toEqual([]);
  });

  it('should bound link numbers by the highest link in use', () => {
    const [item] = createLinkListKnet([{ linknumber: '3' }], 1);
    expect(item?.payload).toEqual({ optionName: 'linknumber', optionValue: '3', allowedValues: '0..1' });
  });

  it('should clamp the highest link number to the knet range', () => {
    expect(createLinkListKnet([{ linknumber: '8' }], 20)[0]?.payload).toMatchObject({
      allowedValues: '0..7',
    });
    expect(createLinkListKnet([{ linknumber: '1' }], -3)[0]?.payload).toMatchObject({
      allowedValues: '0..0',
    });
  });

  it('should require ping_interval and ping_timeout together', () => {
    const reports = createLinkListKnet([{ ping_interval: '1000' }, { ping_timeout: '2000' }], 1);
    expect(reports.map((item) => item.payload)).toEqual([
      {
        optionName: 'ping_interval',
        optionType: '',
        prerequisiteName: 'ping_timeout',
        prerequisiteType: '',
      },
      {
        optionName: 'ping_timeout',
        optionType: '',
        prerequisiteName: 'ping_interval',
        prerequisiteType: '',
      },
    ]);
  });

  it('should report duplicate link numbers once', () => {
    const reports = createLinkListKnet(
      [{ linknumber: '0' }, { linknumber: '1' }, { linknumber: '0' }, { linknumber: '0' }],
      1
    );
    expect(reports).toEqual([
      {
        kind: 'DuplicateLinkNumbers',
        severity: 'ERROR',
        forceCode: null,
        payload: { linkNumbers: ['0'] },
      },
    ]);
  });

  it('should report unknown option names', () => {
    const [item] = createLinkListKnet([{ bindnetaddr: '10.0.0.0' }], 0);
    expect(item?.payload).toEqual({
      optionNames: ['bindnetaddr'],
      allowed: [
        'ip_version',
        'link_priority',
        'linknumber',
        'mcastport',
        'ping_interval',
        'ping_precision',
        'ping_timeout',
        'pong_count',
        'transport',
      ],
      optionType: 'link',
      allowedPatterns: [],
    });
  });

  it('should report more than eight links', () => {
    const reports = createLinkListKnet(
      Array.from({ length: 9 }, () => ({})),
      7
    );
    expect(reports).toEqual([
      {
        kind: 'TooManyLinks',
        severity: 'ERROR',
        forceCode: null,
        payload: { actualCount: 9, maxCount: 8, transport: 'knet' },
      },
    ]);
  });
});
