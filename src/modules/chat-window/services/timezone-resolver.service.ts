import { Injectable } from '@nestjs/common';

import type { IChannelMember } from '../../../core/ports/chat-platform/chat-platform.interfaces';
import type { IResolvedMember } from '../entities/chat-window.interfaces';

const TRUE_LITERALS: ReadonlySet<string> = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);

@Injectable()
export class TimezoneResolverService {
  public resolve(member: IChannelMember): string | null {
    const useAutomatic: boolean = this.parseFlag(member.timezone.useAutomaticTimezone);
    const rawName: string | undefined = useAutomatic
      ? member.timezone.automaticTimezone
      : member.timezone.manualTimezone;
    const zoneName: string = rawName?.trim() ?? '';

    if (zoneName.length === 0) {
      return null;
    }

    return this.canonicalize(zoneName);
  }

  public annotate(members: readonly IChannelMember[]): readonly IResolvedMember[] {
    return members.map(
      (member: IChannelMember): IResolvedMember => ({
        member,
        timeZone: this.resolve(member),
      }),
    );
  }

  // Mattermost stores the flag as a string; unparseable values mean manual.
  private parseFlag(rawFlag: string | undefined): boolean {
    return rawFlag !== undefined && TRUE_LITERALS.has(rawFlag);
  }

  private canonicalize(zoneName: string): string | null {
    try {
      return new Intl.DateTimeFormat('en-US', { timeZone: zoneName }).resolvedOptions().timeZone;
    } catch {
      return null;
    }
  }
}
