/**
 * Risk classifier for resolved shell commands.
 *
 * Looks only at the command text, never at the intent that produced it, so
 * a paraphrased request cannot talk its way into a lower tier. Every rule is
 * evaluated; the highest tier among the matches wins regardless of rule
 * order. Commands that match nothing are Safe.
 */

import { RISK_TIERS, type RiskTier } from '../types/models.js';

export interface RiskRule {
  pattern: RegExp;
  tier: Exclude<RiskTier, 'Safe'>;
  label: string;
}

export interface RiskAssessment {
  tier: RiskTier;
  /** Labels of every matched rule, highest tier first. */
  reasons: string[];
}

// Commands that run the word after them: sudo (with options), nohup, env, timeout, xargs and friends.
const WRAPPER = String.raw`(?:sudo(?:\s+-\S+(?:\s+[^-\s]\S*)?)*|nohup|exec|time|nice(?:\s+-n\s*-?\d+|\s+-\d+)?|env(?:\s+(?:-\S+|\w+=\S*))*|timeout(?:\s+-\S+)*\s+\S+|xargs(?:\s+-\S+)*)`;

// Start of a simple command: start of any line, after a separator or a
// substitution opener, behind wrappers, with an optional directory prefix.
const AT_COMMAND = String.raw`(?:^|[\n;&|(\`]|\$\()\s*(?:${WRAPPER}\s+)*(?:[^\s;&|()\`]*\/)?`;

function command(names: string, rest = String.raw`\b`): RegExp {
  return new RegExp(`${AT_COMMAND}(?:${names})${rest}`);
}

const CRITICAL_UNITS = String.raw`(?:sshd?|network(?:ing)?|NetworkManager|docker|firewalld|systemd-\w+)(?:\.service)?\b`;

const PKG = String.raw`\b(?:apt(?:-get)?|yum|dnf|apk)\s+(?:-\S+\s+)*`;

export const RISK_RULES: readonly RiskRule[] = [
  // ── Filesystem destruction ──
  {
    pattern:
      /\brm\b(?=[^;&|]*\s(?:-[a-zA-Z]*[rR][a-zA-Z]*|--recursive)\b)(?=[^;&|]*\s(?:-[a-zA-Z]*f[a-zA-Z]*|--force)\b)/,
    tier: 'Destructive',
    label: 'filesystem: recursive force delete',
  },
  {
    pattern: /\bdd\b[^;&|]*\bof=\/dev\//,
    tier: 'Destructive',
    label: 'filesystem: raw disk write',
  },
  {
    pattern: />\s*\/dev\/(?:sd|hd|vd|xvd|nvme|mmcblk)/,
    tier: 'Destructive',
    label: 'filesystem: raw disk write',
  },
  {
    pattern: command(String.raw`mkfs(?:\.\w+)?|wipefs|shred`),
    tier: 'Destructive',
    label: 'filesystem: format or wipe',
  },
  {
    pattern: /:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/,
    tier: 'Destructive',
    label: 'system: fork bomb',
  },
  {
    pattern: /\bchmod\s+-R\s+0?777\s+\/(?:\s|$)/,
    tier: 'Destructive',
    label: 'filesystem: world-writable root',
  },

  // ── Accounts ──
  {
    pattern: command('userdel|groupdel|deluser|delgroup'),
    tier: 'Destructive',
    label: 'account: user or group removal',
  },
  {
    pattern: command('passwd|chpasswd|usermod|useradd|adduser|groupmod|gpasswd|visudo'),
    tier: 'Sensitive',
    label: 'account: credential or membership change',
  },

  // ── Service disruption ──
  {
    pattern: command('reboot|shutdown|halt|poweroff'),
    tier: 'Destructive',
    label: 'system: reboot or power off',
  },
  {
    pattern: /\bsystemctl\s+(?:--\S+\s+)*(?:reboot|poweroff|halt|kexec|rescue|emergency)\b/,
    tier: 'Destructive',
    label: 'system: reboot or power off',
  },
  {
    pattern: command('init|telinit', String.raw`\s+[06]\b`),
    tier: 'Destructive',
    label: 'system: reboot or power off',
  },
  {
    pattern: new RegExp(
      String.raw`\bsystemctl\s+(?:--\S+\s+)*(?:stop|restart|disable|mask|kill)\s+(?:\S+\s+)*${CRITICAL_UNITS}`
    ),
    tier: 'Sensitive',
    label: 'service: critical unit disruption',
  },
  {
    pattern: new RegExp(String.raw`\bservice\s+${CRITICAL_UNITS}\s+(?:stop|restart)\b`),
    tier: 'Sensitive',
    label: 'service: critical unit disruption',
  },
  {
    pattern: /\bsystemctl\s+(?:--\S+\s+)*(?:stop|restart|disable|mask|kill|isolate)\b/,
    tier: 'Sensitive',
    label: 'service: stop or restart',
  },
  {
    pattern: /\bservice\s+\S+\s+(?:stop|restart)\b/,
    tier: 'Sensitive',
    label: 'service: stop or restart',
  },
  {
    pattern: command('kill|pkill|killall'),
    tier: 'Sensitive',
    label: 'process: signal',
  },

  // ── Packages & system-wide mutation ──
  {
    pattern: new RegExp(`${PKG}(?:remove|purge|erase|autoremove)\\b[^;&|]*\\b(?:linux-image|kernel)`),
    tier: 'Destructive',
    label: 'package: kernel removal',
  },
  {
    pattern: /\b(?:apt(?:-get)?)\s+(?:-\S+\s+)*(?:upgrade|full-upgrade|dist-upgrade)\b/,
    tier: 'Sensitive',
    label: 'package: full system upgrade',
  },
  {
    pattern: /\b(?:yum|dnf)\s+(?:-\S+\s+)*(?:update|upgrade|distro-sync)\b/,
    tier: 'Sensitive',
    label: 'package: full system upgrade',
  },
  {
    pattern: /\bapk\s+(?:-\S+\s+)*upgrade\b|\bdo-release-upgrade\b/,
    tier: 'Sensitive',
    label: 'package: full system upgrade',
  },
  {
    pattern: new RegExp(`${PKG}(?:remove|purge|erase|autoremove|del)\\b`),
    tier: 'Sensitive',
    label: 'package: removal',
  },

  // ── Other mutation ──
  {
    pattern: /\b(?:chmod|chown|chgrp)\s+(?:-\S+\s+)*-[a-zA-Z]*R/,
    tier: 'Sensitive',
    label: 'filesystem: recursive permission change',
  },
  {
    pattern: />\s*\/etc\//,
    tier: 'Sensitive',
    label: 'filesystem: overwrites system configuration',
  },
  {
    pattern: command('rm'),
    tier: 'Sensitive',
    label: 'filesystem: delete',
  },
  {
    pattern: /\biptables\s+(?:-\S+\s+)*-[FX]\b|\bufw\s+(?:disable|reset)\b/,
    tier: 'Sensitive',
    label: 'network: firewall flush',
  },
  {
    pattern: /\bcrontab\s+(?:-\S+\s+)*-r\b/,
    tier: 'Sensitive',
    label: 'scheduler: crontab removal',
  },
  {
    pattern: /\bdocker\s+(?:rm|rmi|kill|stop)\b|\bdocker\s+(?:system|image|container|volume)\s+prune\b/,
    tier: 'Sensitive',
    label: 'containers: removal or stop',
  },
];

export function tierRank(tier: RiskTier): number {
  return RISK_TIERS.indexOf(tier);
}

export function higherTier(a: RiskTier, b: RiskTier): RiskTier {
  return tierRank(a) >= tierRank(b) ? a : b;
}

export class RiskClassifier {
  constructor(private readonly rules: readonly RiskRule[] = RISK_RULES) {}

  classify(command: string): RiskTier {
    return this.assess(command).tier;
  }

  assess(command: string): RiskAssessment {
    let tier: RiskTier = 'Safe';
    const matched: RiskRule[] = [];

    for (const rule of this.rules) {
      if (rule.pattern.test(command)) {
        matched.push(rule);
        tier = higherTier(tier, rule.tier);
      }
    }

    const reasons = matched
      .sort((a, b) => tierRank(b.tier) - tierRank(a.tier))
      .map((rule) => rule.label);

    return { tier, reasons: [...new Set(reasons)] };
  }
}
