import type { IChannelMember } from '../../../core/ports/chat-platform/chat-platform.interfaces';

export const DAY_START_HOUR = 7;
export const DAY_END_HOUR = 22;
export const VERBOSE_DISPLAY_MAX_MEMBERS = 50;
export const CHANNEL_MEMBERS_PAGE_SIZE = 100;

export interface IResolvedMember {
  readonly member: IChannelMember;
  readonly timeZone: string | null;
}

export interface IDailyWindow {
  readonly start: Date;
  readonly end: Date;
}

export interface ISharedWindowFound {
  readonly hasOverlap: true;
  readonly start: Date;
  readonly end: Date;
}

export interface ISharedWindowMissing {
  readonly hasOverlap: false;
}

export type SharedWindow = ISharedWindowFound | ISharedWindowMissing;

export enum ChannelMembershipStatus {
  COMPLETE = 'complete',
  OVER_CAP = 'over_cap',
}

export type ChannelMembershipResult =
  | {
      readonly status: ChannelMembershipStatus.COMPLETE;
      readonly members: readonly IChannelMember[];
    }
  | {
      readonly status: ChannelMembershipStatus.OVER_CAP;
      readonly fetchedCount: number;
    };

export enum ChatWindowDisplayMode {
  VERBOSE = 'verbose',
  COMPACT = 'compact',
}
