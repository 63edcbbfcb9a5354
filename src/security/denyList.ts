/**
 * Known-dangerous command shapes.
 *
 * This list is advisory. It catches common destructive commands an LLM might
 * suggest; it is incomplete and trivially bypassable (aliases, variables,
 * encodings), and is not a security boundary.
 */

export interface DenyPattern {
  readonly id: string;
  readonly reason: string;
  readonly pattern: RegExp;
}

export type FilterVerdict =
  | { verdict: 'allow' }
  | { verdict: 'deny'; reason: string; patternId: string };

const APPROVED = Symbol('approved');

/** A command that matched none of the deny patterns. Only {@link approveCommand} creates one. */
export interface ApprovedCommand {
  readonly command: string;
  readonly [APPROVED]: true;
}

// Command position: start of input or after a separator, optional sudo.
const CMD = String.raw`(?:^|[;&|({]\s*|\$\(\s*)(?:sudo\s+(?:-\S+\s+)*)?`;
// Command position with sudo required.
const SUDO_CMD = String.raw`(?:^|[;&|({]\s*|\$\(\s*)sudo\s+(?:-\S+\s+)*`;
// Root or home as a whole, optionally globbed or quoted: `/`, `/*`, `'/'`, `~`, `~/`, `"$HOME"`.
const ROOT_TARGET = String.raw`["']?(?:\/\*?|~\/?\*?|\$HOME\/?\*?)["']?(?=$|[\s;&|)])`;

function deny(id: string, reason: string, source: string): DenyPattern {
  return Object.freeze({ id, reason, pattern: new RegExp(source) });
}

export const DENY_PATTERNS: readonly DenyPattern[] = Object.freeze([
  deny(
    'rm-root',
    'system-wide deletion',
    String.raw`${CMD}rm\s+(?:-[a-zA-Z]+\s+|--[a-z-]+\s+)*-[a-zA-Z]*[rR][a-zA-Z]*\s+(?:-[a-zA-Z]+\s+|--[a-z-]+\s+)*${ROOT_TARGET}`
  ),
  deny(
    'rm-no-preserve-root',
    'system-wide deletion',
    String.raw`${CMD}rm\s+.*--no-preserve-root`
  ),
  deny('sudo-rm', 'privileged deletion', String.raw`${SUDO_CMD}rm\b`),
  deny(
    'find-delete-root',
    'system-wide deletion',
    String.raw`${CMD}find\s+\/\s+.*-delete\b`
  ),
  deny(
    'chmod-root',
    'recursive permission change on root',
    String.raw`${CMD}chmod\s+(?:-[a-zA-Z]+\s+)*(?:-[a-zA-Z]*R[a-zA-Z]*|--recursive)\s+(?:\S+\s+)*${ROOT_TARGET}`
  ),
  deny(
    'chown-root',
    'recursive ownership change on root',
    String.raw`${CMD}chown\s+(?:-[a-zA-Z]+\s+)*(?:-[a-zA-Z]*R[a-zA-Z]*|--recursive)\s+(?:\S+\s+)*${ROOT_TARGET}`
  ),
  deny(
    'shutdown',
    'shutdown or reboot',
    String.raw`${CMD}(?:shutdown|reboot|halt|poweroff)\b`
  ),
  deny(
    'init-runlevel',
    'shutdown or reboot',
    String.raw`${CMD}(?:init|telinit)\s+[06]\b`
  ),
  deny(
    'systemctl-power',
    'shutdown or reboot',
    String.raw`${CMD}systemctl\s+(?:poweroff|reboot|halt|kexec)\b`
  ),
  deny('mkfs', 'disk format', String.raw`${CMD}mkfs(?:\.\w+)?\b`),
  deny('wipefs', 'disk format', String.raw`${CMD}wipefs\b`),
  deny('format-drive', 'disk format', String.raw`${CMD}format\s+[A-Za-z]:`),
  deny(
    'partition',
    'disk format',
    String.raw`${CMD}(?:fdisk|sfdisk|parted|gdisk)\s+(?:-\S+\s+)*\/dev\/`
  ),
  deny('dd-device', 'raw device overwrite', String.raw`${CMD}dd\s+.*\bof=\/dev\/(?!null\b)`),
  deny('redirect-device', 'raw device overwrite', String.raw`>\s*\/dev\/(?:sd|nvme|hd|vd|xvd|disk|mmcblk)`),
  deny('shred-device', 'raw device overwrite', String.raw`${CMD}shred\s+.*\/dev\/`),
  deny('shred-file', 'secure file deletion', String.raw`${CMD}shred\b`),
  deny('truncate', 'file truncation', String.raw`${CMD}truncate\b`),
  deny(
    'write-etc',
    'write to system configuration',
    String.raw`>\s*["']?\/etc\/|${CMD}tee\s+(?:-\S+\s+)*["']?\/etc\/`
  ),
  deny(
    'account-change',
    'user account change',
    String.raw`${SUDO_CMD}(?:passwd|userdel|usermod|groupdel)\b`
  ),
  deny('kill-9', 'forced process kill', String.raw`${CMD}(?:kill|pkill|killall)\s+(?:-\S+\s+)*-(?:9|KILL|SIGKILL)\b`),
  deny(
    'firewall-flush',
    'firewall flush',
    String.raw`${CMD}(?:iptables|ip6tables)\s+(?:-\S+\s+)*(?:-F|--flush)\b`
  ),
  deny(
    'service-stop',
    'stopping system services',
    String.raw`${CMD}(?:systemctl\s+(?:-\S+\s+)*stop|service\s+(?:\S+\s+)?stop)\b`
  ),
  deny('fork-bomb', 'fork bomb', String.raw`(\w+|:)\(\)\s*\{\s*\1\s*\|\s*\1\s*&\s*\}\s*;\s*\1`),
  deny(
    'pipe-download-exec',
    'piped download-then-execute',
    String.raw`\b(?:curl|wget|fetch)\b[^|]*\|\s*(?:sudo\s+)?(?:ba|z|k|da)?sh\b`
  ),
  deny(
    'subst-download-exec',
    'piped download-then-execute',
    String.raw`(?:(?:ba|z|k|da)?sh\s+(?:-c\s+)?["']?|source\s+|\.\s+|eval\s+["']?)(?:<\(|\$\()\s*(?:curl|wget)\b`
  ),
  deny(
    'decode-exec',
    'decode-then-execute',
    String.raw`base64\s+(?:-d|--decode)\b[^|]*\|\s*(?:sudo\s+)?(?:ba|z|k|da)?sh\b`
  ),
  deny('eval-subst', 'evaluating command output', String.raw`\beval\s+["']?\$\(`),
  deny('pipe-shell', 'pipe into a shell', String.raw`\|\s*(?:sudo\s+)?(?:ba|z|k|da)?sh\b`),
]);

/** First matching pattern decides the reason; no match allows. */
export function evaluateCommand(
  command: string,
  patterns: readonly DenyPattern[] = DENY_PATTERNS
): FilterVerdict {
  for (const entry of patterns) {
    if (entry.pattern.test(command)) {
      return { verdict: 'deny', reason: entry.reason, patternId: entry.id };
    }
  }
  return { verdict: 'allow' };
}

export function isCommandAllowed(command: string): boolean {
  return evaluateCommand(command).verdict === 'allow';
}

export function approveCommand(
  command: string,
  patterns: readonly DenyPattern[] = DENY_PATTERNS
): { approved: ApprovedCommand } | { approved: null; reason: string; patternId: string } {
  const result = evaluateCommand(command, patterns);
  if (result.verdict === 'deny') {
    return { approved: null, reason: result.reason, patternId: result.patternId };
  }
  return { approved: Object.freeze({ command, [APPROVED]: true as const }) };
}

const HIGH_RISK_TERMS = /\b(?:rm|sudo|chmod|chown|mkfs|dd|kill|truncate|mv|format|delete)\b/;

export function estimateRisk(command: string): 'high' | 'low' {
  return HIGH_RISK_TERMS.test(command) ? 'high' : 'low';
}
