/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { TZDate } from '@date-fns/tz';
import { format } from 'date-fns';

export const DEFAULT_REPORT_TIME_ZONE = 'Asia/Seoul';

export const FILE_STAMP_PATTERN = 'yyyyMMdd_HHmmss';
export const DISPLAY_STAMP_PATTERN = 'yyyy-MM-dd HH:mm:ss';

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const inZone = (timestamp: Date, timeZone: string): TZDate =>
  new TZDate(timestamp.getTime(), timeZone);

/** `YYYYMMDD_HHMMSS` in the reporting zone, used in artifact names. */
export const formatFileStamp = (timestamp: Date, timeZone: string): string =>
  format(inZone(timestamp, timeZone), FILE_STAMP_PATTERN);

export const formatDisplayStamp = (timestamp: Date, timeZone: string): string =>
  `${format(inZone(timestamp, timeZone), DISPLAY_STAMP_PATTERN)} (${timeZone})`;
