import { describe, expect, it } from 'vitest';

import { TimezoneResolverService } from './timezone-resolver.service';
import { buildChannelMember } from '../../../../test/helpers/channel-member.fixture';

describe('TimezoneResolverService', (): void => {
  const service: TimezoneResolverService = new TimezoneResolverService();

  it.each(['1', 't', 'T', 'TRUE', 'true', 'True'])(
    'uses automatic zone when flag is %s',
    (flag: string): void => {
      const member = buildChannelMember('user-1', {
        timezone: {
          useAutomaticTimezone: flag,
          automaticTimezone: 'Europe/Berlin',
          manualTimezone: 'Asia/Tokyo',
        },
      });

      expect(service.resolve(member)).toBe('Europe/Berlin');
    },
  );

  it.each(['0', 'f', 'F', 'FALSE', 'false', 'False', 'yes', ''])(
    'uses manual zone when flag is "%s"',
    (flag: string): void => {
      const member = buildChannelMember('user-1', {
        timezone: {
          useAutomaticTimezone: flag,
          automaticTimezone: 'Europe/Berlin',
          manualTimezone: 'Asia/Tokyo',
        },
      });

      expect(service.resolve(member)).toBe('Asia/Tokyo');
    },
  );

  it('falls back to manual zone when flag is missing', (): void => {
    const member = buildChannelMember('user-1', {
      timezone: { automaticTimezone: 'Europe/Berlin', manualTimezone: 'America/New_York' },
    });

    expect(service.resolve(member)).toBe('America/New_York');
  });

  it('trims surrounding whitespace from zone name', (): void => {
    const member = buildChannelMember('user-1', {
      timezone: { useAutomaticTimezone: 'false', manualTimezone: '  Asia/Tokyo  ' },
    });

    expect(service.resolve(member)).toBe('Asia/Tokyo');
  });

  it('returns null for empty or blank zone name', (): void => {
    const emptyMember = buildChannelMember('user-1', {
      timezone: { useAutomaticTimezone: 'true', automaticTimezone: '' },
    });
    const blankMember = buildChannelMember('user-2', {
      timezone: { useAutomaticTimezone: 'false', manualTimezone: '   ' },
    });
    const noPreferenceMember = buildChannelMember('user-3');

    expect(service.resolve(emptyMember)).toBeNull();
    expect(service.resolve(blankMember)).toBeNull();
    expect(service.resolve(noPreferenceMember)).toBeNull();
  });

  it('returns null for unknown zone name', (): void => {
    const member = buildChannelMember('user-1', {
      timezone: { useAutomaticTimezone: 'false', manualTimezone: 'Mars/Olympus_Mons' },
    });

    expect(service.resolve(member)).toBeNull();
  });

  it('reports canonical identifier for zone aliases', (): void => {
    const member = buildChannelMember('user-1', {
      timezone: { useAutomaticTimezone: 'false', manualTimezone: 'Etc/UTC' },
    });

    expect(service.resolve(member)).toBe('UTC');
  });

  it('annotates members keeping input order', (): void => {
    const members = [
      buildChannelMember('user-1', {
        timezone: { useAutomaticTimezone: 'false', manualTimezone: 'Asia/Tokyo' },
      }),
      buildChannelMember('user-2'),
      buildChannelMember('user-3', {
        timezone: { useAutomaticTimezone: 'true', automaticTimezone: 'UTC' },
      }),
    ];

    const resolved = service.annotate(members);

    expect(resolved.map((entry) => [entry.member.id, entry.timeZone])).toEqual([
      ['user-1', 'Asia/Tokyo'],
      ['user-2', null],
      ['user-3', 'UTC'],
    ]);
  });
});
