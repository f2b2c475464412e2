/**
 * Output markers recognised in the VPN binary's (and the escalation
 * tool's) stdout/stderr.
 *
 * Matching on free text is brittle across openconnect and sudo
 * releases, so the whole table carries a version. Bump it whenever a
 * pattern changes; the version is logged with every tunnel start.
 */

import type { PromptKind } from '../types/index.js';

export const MARKER_SET_VERSION = 2;

/** Prompt text passed to `sudo -p`, so the password prompt is unambiguous. */
export const ESCALATION_PROMPT = 'tunnelkit-escalation-password:';

/** Line the Windows elevation wrapper prints with the elevated PID. */
export const ELEVATED_PID_MARKER = 'tunnelkit-elevated-pid:';

export type MarkerKind = 'prompt' | 'rejected-credential' | 'escalation-denied' | 'elevated-pid';

export interface OutputMarker {
  kind: MarkerKind;
  /** Set for `prompt` markers */
  promptKind?: PromptKind;
  pattern: RegExp;
}

export const OUTPUT_MARKERS: readonly OutputMarker[] = [
  {
    kind: 'prompt',
    promptKind: 'escalation-password',
    pattern: /tunnelkit-escalation-password:|^\[sudo\] password for [^:]+:\s*$|^Password:\s*$/i,
  },
  {
    kind: 'prompt',
    promptKind: 'mfa',
    pattern: /^(Response|Token code|Passcode|Verification code|Enter [^:]*code)\s*:\s*$/i,
  },
  {
    kind: 'rejected-credential',
    pattern:
      /cookie (was rejected|is no longer valid|rejected)|Failed to obtain WebVPN cookie|Unexpected 302 result|Invalid cookie|session (has )?expired/i,
  },
  {
    kind: 'escalation-denied',
    pattern:
      /incorrect password attempts?|is not in the sudoers file|not allowed to execute|Request dismissed|Not authorized/i,
  },
  {
    kind: 'elevated-pid',
    pattern: /^tunnelkit-elevated-pid:\s*\d+$/,
  },
];

/** PID carried by an `elevated-pid` line, or null. */
export function parseElevatedPid(line: string): number | null {
  const match = /^tunnelkit-elevated-pid:\s*(\d+)$/.exec(line.trim());
  return match ? Number(match[1]) : null;
}

/** First marker matching `line`, or null. */
export function classifyLine(line: string): OutputMarker | null {
  const text = line.trim();
  if (!text) return null;
  return OUTPUT_MARKERS.find((marker) => marker.pattern.test(text)) ?? null;
}

/**
 * Splits a chunked byte stream into lines.
 *
 * Prompts are written without a trailing newline, so a partial line
 * that already matches a `prompt` marker is released immediately
 * instead of waiting for a newline that never comes.
 */
export class LineSplitter {
  private buffer = '';

  push(chunk: string): string[] {
    this.buffer += chunk;
    const parts = this.buffer.split(/\r?\n/);
    this.buffer = parts.pop() ?? '';

    const lines = parts.filter((part) => part.length > 0);
    if (this.buffer && classifyLine(this.buffer)?.kind === 'prompt') {
      lines.push(this.buffer);
      this.buffer = '';
    }
    return lines;
  }

  /** Remaining partial line, if any; resets the buffer. */
  flush(): string | null {
    const rest = this.buffer;
    this.buffer = '';
    return rest ? rest : null;
  }
}
