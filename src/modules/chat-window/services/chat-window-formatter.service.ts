import { Injectable } from '@nestjs/common';
import { enUS } from 'date-fns/locale';
import { formatInTimeZone } from 'date-fns-tz';

import type { IChannelMember } from '../../../core/ports/chat-platform/chat-platform.interfaces';
import {
  ChatWindowDisplayMode,
  type IResolvedMember,
  type ISharedWindowFound,
  VERBOSE_DISPLAY_MAX_MEMBERS,
} from '../entities/chat-window.interfaces';

export const BEST_TIMES_HEADER = 'It looks like the best times to chat are:';
export const NO_WINDOW_MESSAGE = 'There is no window that suits everyone.';
export const TOO_MANY_MEMBERS_MESSAGE = 'Too many channel members.';

const WALL_CLOCK_FORMAT = 'h:mmaaa';
const ZONE_NAME_FORMAT = 'zzz';
const SORTABLE_START_FORMAT = 'HH:mm';
const FORMAT_OPTIONS = { locale: enUS };

interface IZoneGroup {
  readonly timeZone: string;
  readonly representative: IChannelMember;
  size: number;
}

@Injectable()
export class ChatWindowFormatterService {
  public formatWindow(window: ISharedWindowFound, members: readonly IResolvedMember[]): string {
    const lines: readonly string[] =
      this.selectDisplayMode(members.length) === ChatWindowDisplayMode.VERBOSE
        ? this.buildVerboseLines(window, members)
        : this.buildCompactLines(window, members);

    return [BEST_TIMES_HEADER, ...lines].join('\n');
  }

  public formatNoWindow(): string {
    return NO_WINDOW_MESSAGE;
  }

  public formatOverCap(): string {
    return TOO_MANY_MEMBERS_MESSAGE;
  }

  public selectDisplayMode(memberCount: number): ChatWindowDisplayMode {
    return memberCount > VERBOSE_DISPLAY_MAX_MEMBERS
      ? ChatWindowDisplayMode.COMPACT
      : ChatWindowDisplayMode.VERBOSE;
  }

  public buildVerboseLines(
    window: ISharedWindowFound,
    members: readonly IResolvedMember[],
  ): string[] {
    return members.map((resolvedMember: IResolvedMember): string => {
      const displayName: string = this.resolveDisplayName(resolvedMember.member);

      if (resolvedMember.timeZone === null) {
        return `- ${displayName}: ?`;
      }

      return `- ${displayName}: ${this.formatRange(window, resolvedMember.timeZone)}`;
    });
  }

  public buildCompactLines(
    window: ISharedWindowFound,
    members: readonly IResolvedMember[],
  ): string[] {
    const groups: IZoneGroup[] = this.groupByTimeZone(members);
    const sortedGroups: IZoneGroup[] = groups
      .map((group: IZoneGroup) => ({
        group,
        sortKey: this.formatInZone(window.start, group.timeZone, SORTABLE_START_FORMAT),
        displayName: this.resolveDisplayName(group.representative),
      }))
      .sort((left, right): number => {
        if (left.sortKey !== right.sortKey) {
          return left.sortKey < right.sortKey ? -1 : 1;
        }

        return left.displayName.localeCompare(right.displayName);
      })
      .map(({ group }): IZoneGroup => group);

    return sortedGroups.map((group: IZoneGroup): string => {
      const label: string = `${this.resolveDisplayName(group.representative)}${this.formatOthers(
        group.size,
      )}`;

      return `- ${label}: ${this.formatRange(window, group.timeZone)}`;
    });
  }

  private groupByTimeZone(members: readonly IResolvedMember[]): IZoneGroup[] {
    const groupsByZone: Map<string, IZoneGroup> = new Map<string, IZoneGroup>();

    for (const resolvedMember of members) {
      if (resolvedMember.timeZone === null) {
        continue;
      }

      const existingGroup: IZoneGroup | undefined = groupsByZone.get(resolvedMember.timeZone);

      if (existingGroup === undefined) {
        groupsByZone.set(resolvedMember.timeZone, {
          timeZone: resolvedMember.timeZone,
          representative: resolvedMember.member,
          size: 1,
        });
        continue;
      }

      existingGroup.size += 1;
    }

    return [...groupsByZone.values()];
  }

  private formatOthers(groupSize: number): string {
    if (groupSize <= 1) {
      return '';
    }

    if (groupSize === 2) {
      return ' and 1 other';
    }

    return ` and ${String(groupSize - 1)} others`;
  }

  private formatRange(window: ISharedWindowFound, timeZone: string): string {
    const start: string = this.formatInZone(window.start, timeZone, WALL_CLOCK_FORMAT);
    const end: string = this.formatInZone(window.end, timeZone, WALL_CLOCK_FORMAT);
    const zoneName: string = this.formatInZone(window.end, timeZone, ZONE_NAME_FORMAT);

    return `${start} - ${end} (${zoneName})`;
  }

  private formatInZone(instant: Date, timeZone: string, pattern: string): string {
    return formatInTimeZone(instant, timeZone, pattern, FORMAT_OPTIONS);
  }

  private resolveDisplayName(member: IChannelMember): string {
    const fullName: string = `${member.firstName} ${member.lastName}`.trim();

    return fullName.length > 0 ? fullName : member.username;
  }
}
