import { Injectable } from '@nestjs/common';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

import {
  DAY_END_HOUR,
  DAY_START_HOUR,
  type IDailyWindow,
  type IResolvedMember,
  type SharedWindow,
} from '../entities/chat-window.interfaces';

const LOCAL_DATE_FORMAT = 'yyyy-MM-dd';

const formatHour = (hour: number): string => `${String(hour).padStart(2, '0')}:00:00`;

@Injectable()
export class WindowIntersectorService {
  public dailyWindow(timeZone: string, now: Date): IDailyWindow {
    const localDate: string = formatInTimeZone(now, timeZone, LOCAL_DATE_FORMAT);

    return {
      start: fromZonedTime(`${localDate}T${formatHour(DAY_START_HOUR)}`, timeZone),
      end: fromZonedTime(`${localDate}T${formatHour(DAY_END_HOUR)}`, timeZone),
    };
  }

  public computeSharedWindow(
    resolvedMembers: readonly IResolvedMember[],
    now: Date = new Date(),
  ): SharedWindow {
    let bounds: IDailyWindow | null = null;

    for (const resolvedMember of resolvedMembers) {
      if (resolvedMember.timeZone === null) {
        continue;
      }

      const memberWindow: IDailyWindow = this.dailyWindow(resolvedMember.timeZone, now);

      const nextBounds: IDailyWindow =
        bounds === null
          ? memberWindow
          : {
              start: memberWindow.start > bounds.start ? memberWindow.start : bounds.start,
              end: memberWindow.end < bounds.end ? memberWindow.end : bounds.end,
            };

      bounds = nextBounds;

      if (bounds.start.getTime() >= bounds.end.getTime()) {
        return { hasOverlap: false };
      }
    }

    if (bounds === null) {
      return { hasOverlap: false };
    }

    return {
      hasOverlap: true,
      start: bounds.start,
      end: bounds.end,
    };
  }
}
