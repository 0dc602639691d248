import type { VolumeHeader } from './volume-header.js';
import type { Fragment } from './fragment-record.js';
import { isCompleteFragment } from './fragment-record.js';

function warningSuffix(warnings: readonly string[]): string {
  return warnings.length > 0 ? `## (${warnings.join(', ')})` : '';
}

const pad2 = (n: number): string => String(n).padStart(2, '0');

/** e.g. `Disk 2 last, 1991-03-07` */
export function describeVolumeHeader(header: VolumeHeader): string {
  const lastMarker = header.last ? ' last' : '';
  const date = `${String(header.year).padStart(4, ' ')}-${pad2(header.month)}-${pad2(header.day)}`;
  return `Disk ${header.sequence}${lastMarker}, ${date}${warningSuffix(header.warnings)}`;
}

/** e.g. `\DOCS\REPORT.TXT (seq 2 last)` */
export function describeFragment(fragment: Fragment): string {
  let status: string;
  if (isCompleteFragment(fragment)) {
    status = 'complete';
  } else {
    status = `seq ${fragment.sequence}${fragment.last ? ' last' : ''}`;
  }
  return `${fragment.logicalPath} (${status})${warningSuffix(fragment.warnings)}`;
}
