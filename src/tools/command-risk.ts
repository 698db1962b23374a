/**
 * Shell command risk classification.
 *
 * A heuristic layer in front of the bash tool: a flagged command costs a
 * confirmation prompt, never a silent block. Misses are possible (shell
 * quoting, variables, aliases) so the path sandbox and the approval
 * channel stay the real barriers.
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { canonicalizePath, isWithinRoot } from '../integrations/path-sandbox.js';

export interface RiskRule {
  pattern: RegExp;
  description: string;
}

export interface RiskVerdict {
  requiresApproval: boolean;
  reason: string;
}

export const SAFE_VERDICT_REASON = 'No risky patterns detected';

/**
 * Ordered rules; the first match supplies the reason.
 */
export const DEFAULT_RISK_RULES: readonly RiskRule[] = [
  {
    pattern: /\brm\s+(?:-\S+\s+)*(?:\/\*?|~\/?|\$HOME\/?|\$\{HOME\}\/?)(?=[\s;&|)]|$)/,
    description: 'Deletes the filesystem root or the home directory',
  },
  {
    pattern: /(?:^|[\s;&|(])(?:sudo|doas)\b|(?:^|[;&|(]\s*)su(?:\s|$)/,
    description: 'Privilege escalation',
  },
  {
    pattern:
      /\b(?:curl|wget)\b[^|;&]*\|\s*(?:sudo\s+)?(?:(?:ba|z|da|k)?sh|python3?|perl|ruby|node)\b|\b(?:ba|z)?sh\s+<\(\s*(?:curl|wget)\b/,
    description: 'Pipes a remote download into an interpreter',
  },
  {
    pattern: /\bdd\b[^;&|]*\bof=\/dev\/|>\s*\/dev\/(?:sd|hd|vd|xvd|nvme|disk|mmcblk)/,
    description: 'Raw write to a disk device',
  },
  {
    pattern: /\b(?:mkfs(?:\.\w+)?|mkswap|wipefs|fdisk|sfdisk|parted)\b/,
    description: 'Creates a filesystem or rewrites a partition table',
  },
  {
    pattern: /\bchmod\s+(?:-\S+\s+)*(?:[0-7]?[0-7]{2}[2367]\b|[ugo]*[ao][ugo]*[+=][rwxXst]*w|\+[rwxXst]*w)/,
    description: 'Makes files world-writable',
  },
  {
    pattern: /:\s*\(\s*\)\s*\{[^}]*:\s*\|\s*:[^}]*&[^}]*\}\s*;?\s*:/,
    description: 'Fork bomb',
  },
  {
    pattern: /(?:^|[;&|(]\s*)(?:shutdown|reboot|halt|poweroff)\b|\binit\s+[06]\b/,
    description: 'Changes the machine power state',
  },
];

/**
 * Absolute-path prefixes that never need approval. Compared after
 * lexical normalization, so `/usr/bin/../../etc` does not qualify.
 */
export const DEFAULT_ALLOWED_PATHS: readonly string[] = [
  '/bin',
  '/sbin',
  '/usr/bin',
  '/usr/sbin',
  '/usr/local/bin',
  '/usr/local/sbin',
  '/opt/homebrew/bin',
  '/dev/null',
  '/dev/stdin',
  '/dev/stdout',
  '/dev/stderr',
  '/dev/tty',
  '/dev/zero',
  '/dev/random',
  '/dev/urandom',
];

export interface CommandRiskClassifierOptions {
  workspaceRoot: string;
  rules?: readonly RiskRule[];
  allowedPaths?: readonly string[];
}

/** Separators between words that can hold a path */
const TOKEN_SPLIT = /[\s;&|<>()`'"=,]+/;

export class CommandRiskClassifier {
  private readonly root: string;
  private readonly rules: readonly RiskRule[];
  private readonly allowedPaths: readonly string[];

  constructor(options: CommandRiskClassifierOptions) {
    this.root = canonicalizePath(options.workspaceRoot);
    this.rules = options.rules ?? DEFAULT_RISK_RULES;
    this.allowedPaths = options.allowedPaths ?? DEFAULT_ALLOWED_PATHS;
  }

  classify(command: string): RiskVerdict {
    const normalized = command.trim();

    for (const rule of this.rules) {
      if (rule.pattern.test(normalized)) {
        return { requiresApproval: true, reason: rule.description };
      }
    }

    for (const token of extractPathTokens(normalized)) {
      const escaped = this.escapesWorkspace(token);
      if (escaped) {
        return {
          requiresApproval: true,
          reason: `References ${token} outside the workspace (${escaped})`,
        };
      }
    }

    return { requiresApproval: false, reason: SAFE_VERDICT_REASON };
  }

  /**
   * Canonical location of `token` when it falls outside both the
   * allow-list and the workspace, otherwise undefined.
   */
  private escapesWorkspace(token: string): string | undefined {
    let absolute: string;
    if (token === '~' || token.startsWith('~/')) {
      absolute = resolve(homedir(), token.slice(2));
    } else if (token.startsWith('/')) {
      absolute = resolve(token);
      if (this.allowedPaths.some(allowed => isWithinRoot(absolute, allowed))) {
        return undefined;
      }
    } else {
      absolute = resolve(this.root, token);
    }

    let canonical: string;
    try {
      canonical = canonicalizePath(absolute);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return `unresolvable: ${reason}`;
    }
    return isWithinRoot(canonical, this.root) ? undefined : canonical;
  }
}

/**
 * Words that look like filesystem paths worth checking: absolute,
 * home-relative, or relative with a `..` segment.
 */
export function extractPathTokens(command: string): string[] {
  const tokens = command.split(TOKEN_SPLIT).filter(t => t.length > 0);
  return tokens.filter(
    token =>
      token.startsWith('/') ||
      token === '~' ||
      token.startsWith('~/') ||
      token.split('/').includes('..')
  );
}
