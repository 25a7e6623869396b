import type { CheckResult } from './types.js';

/** Title and separator rows that open every report. */
export const REPORT_HEADER = [
  '| 狀態 | 網址 | 轉址網址 |',
  '| --- | --- | ------ |',
] as const;

const MOVED_MARKER = '301 轉址';
const UNAVAILABLE_MARKER = '404 失效';

/**
 * Turns a check result into a markdown table row.
 * @param url The URL that was requested.
 * @returns `undefined` for a normal site, since there is nothing to report.
 */
export function interpretResult(
  url: string,
  result: CheckResult
): string | undefined {
  switch (result.status) {
    case 'normal':
      return undefined;
    case 'moved':
      return `| ${MOVED_MARKER} | ${url} | ${result.redirectUrl} |`;
    case 'unavailable':
      return `| ${UNAVAILABLE_MARKER} | ${url} | |`;
  }
}

/**
 * Renders the full report: header rows followed by the given rows, in order.
 */
export function renderReport(rows: readonly string[]): string {
  return [...REPORT_HEADER, ...rows].join('\n');
}
