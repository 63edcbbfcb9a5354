import safeCommands from './safe-commands.json';

export type SafeModeVerdict = { allowed: true } | { allowed: false; reason: string };

export const SAFE_COMMANDS: readonly string[] = Object.freeze([...safeCommands]);

// Redirection, chaining, backgrounding, substitution.
const FORBIDDEN_SYNTAX = /[;&<>`\n]|\$\(|\|\|/;

type ArgumentGuard = RegExp | ((args: readonly string[]) => boolean);

function listingOnly(flags: readonly string[], operandFlags: readonly string[] = []): ArgumentGuard {
  const allowed = new Set([...flags, ...operandFlags]);
  return (args) => {
    const options = args.filter((arg) => arg.startsWith('-'));
    if (options.some((option) => !allowed.has(option))) {
      return true;
    }
    const hasOperands = args.some((arg) => !arg.startsWith('-'));
    return hasOperands && !options.some((option) => operandFlags.includes(option));
  };
}

const UNIQ_VALUE_OPTIONS = new Set(['-f', '-s', '-w', '--skip-fields', '--skip-chars', '--check-chars']);

// a second operand is the output file
function uniqWritesOutput(args: readonly string[]): boolean {
  let operands = 0;
  let optionsDone = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!optionsDone && arg === '--') {
      optionsDone = true;
    } else if (!optionsDone && arg.length > 1 && arg.startsWith('-')) {
      if (UNIQ_VALUE_OPTIONS.has(arg)) {
        i++;
      }
    } else {
      operands++;
    }
  }
  return operands >= 2;
}

// Allow-listed commands that can still write or run other programs through their
// arguments. Keyed by allow-list entry or by program name.
const ARGUMENT_GUARDS = new Map<string, ArgumentGuard>([
  ['find', /\s-(?:delete|exec|execdir|ok|okdir|fprint0?|fprintf|fls)\b/],
  ['awk', /\bsystem\s*\(/],
  ['env', /\S\s+\S/],
  ['git', /\s--output(?:=|\s)/],
  // -i, --in-place, and the w/W/e script commands or s/// flags
  ['sed', /\s(?:-[a-zA-Z]*i|--in-place)|(?:^|[^A-Za-z\\-])[wWe](?:\s|$|[;}'"])/],
  ['sort', /\s(?:-[a-zA-Z]*o|--output|--compress-program)/],
  ['tree', /\s-[a-zA-Z]*o/],
  ['uniq', uniqWritesOutput],
  ['date', /\s(?:-[uR]*s|--set\b)/],
  [
    'git branch',
    listingOnly(
      ['-a', '--all', '-r', '--remotes', '-v', '-vv', '--verbose', '--show-current'],
      ['-l', '--list', '--merged', '--no-merged', '--contains']
    ),
  ],
  ['git remote', listingOnly(['-v', '--verbose'])],
  [
    'hostname',
    listingOnly(['-f', '-s', '-i', '-I', '-d', '-A', '--fqdn', '--short', '--ip-address', '--all-ip-addresses', '--domain']),
  ],
]);

function guardFor(entry: string, normalized: string): string | undefined {
  const program = entry.split(' ')[0];
  const args = normalized.slice(entry.length).split(' ').filter(Boolean);
  return [entry, program].find((key) => {
    const guard = ARGUMENT_GUARDS.get(key);
    if (!guard) {
      return false;
    }
    return guard instanceof RegExp ? guard.test(normalized) : guard(args);
  });
}

/**
 * Read-only allow-list check. Every pipeline segment has to start with an
 * allow-listed command; anything that redirects, chains or substitutes is refused.
 */
export function checkSafeMode(
  command: string,
  allowList: readonly string[] = SAFE_COMMANDS
): SafeModeVerdict {
  const trimmed = command.trim();
  if (!trimmed) {
    return { allowed: false, reason: 'empty command' };
  }
  if (FORBIDDEN_SYNTAX.test(trimmed)) {
    return {
      allowed: false,
      reason: 'redirection, chaining and command substitution are not allowed',
    };
  }
  const segments = trimmed.split('|').map((segment) => segment.trim());
  for (const segment of segments) {
    if (!segment) {
      return { allowed: false, reason: 'empty pipeline segment' };
    }
    const normalized = segment.replace(/\s+/g, ' ');
    const entry = matchAllowList(normalized, allowList);
    if (!entry) {
      const program = normalized.split(' ')[0];
      return { allowed: false, reason: `'${program}' is not in the read-only allow-list` };
    }
    const guarded = guardFor(entry, normalized);
    if (guarded) {
      return { allowed: false, reason: `'${guarded}' is used with arguments that can modify the system` };
    }
  }
  return { allowed: true };
}

function matchAllowList(normalized: string, allowList: readonly string[]): string | undefined {
  // Longest entry first so `git status` wins over a bare `git`.
  return [...allowList]
    .sort((a, b) => b.length - a.length)
    .find((entry) => normalized === entry || normalized.startsWith(`${entry} `));
}
