// Dangerous shell idioms, checked against every command line regardless of the allow-list
// Bump DANGEROUS_PATTERN_TABLE_VERSION whenever an entry is added, removed or changed.

import type { SecuritySeverity } from "./types.js";

export interface DangerousPattern {
  /** Stable identifier, reported in issue descriptions */
  readonly id: string;
  readonly pattern: RegExp;
  readonly severity: Extract<SecuritySeverity, "high" | "critical">;
  readonly description: string;
}

export const DANGEROUS_PATTERN_TABLE_VERSION = "2026.10.2";

// Start of a command word: line start, whitespace or a shell operator, then an
// optional backslash or quote and an optional directory prefix (`/usr/bin/sudo`)
const CMD = String.raw`(?:^|[\s;&|(\x60])[\\'"]?(?:[^\s'"]*\/)?`;
// Closing quote of a quoted command word
const END = String.raw`['"]?`;
const SHELL = String.raw`(?:sudo\s+)?(?:\S*\/)?(?:env\s+)?(?:ba|z|k|da)?sh\b`;
// Filesystem root, a top-level directory, a home directory or `~`/`$HOME`, optionally quoted
const ROOT_TARGET = String.raw`["']?(?:\/+(?:(?:home|Users)\/+[^\s/'"*]+\/*|[^\s/'"*]+\/*)?|~\/*|\$\{?HOME\}?\/*)\*?["']?`;

export const DANGEROUS_PATTERNS: readonly DangerousPattern[] = Object.freeze([
  {
    id: "rm-recursive-root",
    pattern: new RegExp(
      String.raw`\brm\s+(?:-{1,2}[\w-]+\s+)*?(?:-[a-zA-Z]*[rR][a-zA-Z]*|--recursive)\s+(?:-{1,2}[\w-]+\s+)*${ROOT_TARGET}(?=$|[\s;&|])`,
    ),
    severity: "critical",
    description: "Recursive delete of the filesystem root, a top-level or a home directory",
  },
  {
    id: "download-pipe-shell",
    pattern: new RegExp(String.raw`\b(?:curl|wget)\b[^|]*\|\s*${SHELL}`),
    severity: "critical",
    description: "Downloads a script and pipes it straight into a shell",
  },
  {
    id: "pipe-to-shell",
    pattern: new RegExp(String.raw`\|\s*${SHELL}`),
    severity: "high",
    description: "Pipes output into a shell interpreter",
  },
  {
    id: "device-write",
    pattern: /(?:^|[^>])>{1,2}\s*\/dev\/(?!null\b|stdout\b|stderr\b|tty\b|fd\/)/,
    severity: "critical",
    description: "Redirects output onto a device file",
  },
  {
    id: "dd-to-device",
    pattern: /\bdd\s+[^|;&]*\bof=\/dev\//,
    severity: "critical",
    description: "Writes raw blocks onto a device with dd",
  },
  {
    id: "dd-from-zero",
    pattern: /\bdd\s+[^|;&]*\bif=\/dev\/(?:zero|u?random)\b/,
    severity: "high",
    description: "Streams an endless device into dd",
  },
  {
    id: "mkfs",
    pattern: /\bmkfs\b/,
    severity: "critical",
    description: "Formats a filesystem",
  },
  {
    id: "fork-bomb",
    pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;?\s*:/,
    severity: "critical",
    description: "Shell fork bomb",
  },
  {
    id: "chmod-world-writable",
    pattern: /\bchmod\s+(?:-[a-zA-Z]+\s+)*(?:0?777|(?:a|ugo)\+rwx)\b/,
    severity: "high",
    description: "Makes files world-writable",
  },
  {
    id: "sudo",
    pattern: new RegExp(String.raw`${CMD}sudo${END}\s`),
    severity: "high",
    description: "Privilege escalation through sudo",
  },
  {
    id: "su-login",
    pattern: new RegExp(String.raw`${CMD}su${END}(?:\s+-\S*|\s+root\b|$)`),
    severity: "high",
    description: "Switches to another user with su",
  },
  {
    id: "doas",
    pattern: new RegExp(String.raw`${CMD}doas${END}\s`),
    severity: "high",
    description: "Privilege escalation through doas",
  },
  {
    id: "path-override",
    pattern: /\b(?:export\s+PATH\s*=|unset\s+PATH\b)/,
    severity: "high",
    description: "Replaces or clears the executable search path",
  },
]);

/** Every table entry that matches the command line, in table order. */
export function findDangerousPatterns(commandLine: string): DangerousPattern[] {
  return DANGEROUS_PATTERNS.filter((entry) => entry.pattern.test(commandLine));
}
