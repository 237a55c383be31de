import { contextCommand, type Rule } from "hookwarden-core";
import { stringListOption } from "../options.js";

const EXFIL_PATTERNS: { re: RegExp; label: string }[] = [
  {
    re: /\bcurl\b.*(?:-X\s*(?:POST|PUT)\s.*-[dF@]|-[dF@]\s.*-X\s*(?:POST|PUT))/i,
    label: "curl POST/PUT with data",
  },
  { re: /\bcurl\b.*-d\s*@\S+/i, label: "curl -d @file" },
  {
    re: /cat\s+\S*(?:\.env|secret|credential|token|\.pem|\.key|id_rsa)\S*\s*\|.*\bcurl\b/i,
    label: "piping secrets to curl",
  },
  { re: /\bnc\b.*<\s*\S*(?:\.env|secret|credential|token|\.pem|\.key)/i, label: "nc < sensitive file" },
  { re: /\bscp\b.*(?:\.env|credential|secret|token|\.pem|\.key|id_rsa)/i, label: "scp sensitive file" },
  { re: /\bwget\b.*--post-(?:file|data)/i, label: "wget POST" },
  { re: /\bpython[23]?\s+-c\s+.*requests\.(?:post|put)\b/i, label: "python requests.post()" },
  {
    re: /\brsync\b.*(?:\.env|credential|secret|token|\.pem|\.key).*\S+:\S+/i,
    label: "rsync sensitive files to remote",
  },
];

const DEFAULT_ALLOWED_HOSTS = ["github.com", "pypi.org", "registry.npmjs.org", "rubygems.org"];

export function extractHost(command: string): string | null {
  const url = /https?:\/\/([^/:\s]+)/.exec(command);
  if (url?.[1]) return url[1].toLowerCase();
  const nc = /\bnc\s+(\S+)\s+\d+/.exec(command);
  if (nc?.[1]) return nc[1].toLowerCase();
  return null;
}

export const noNetworkExfil: Rule = {
  id: "no-network-exfil",
  description: "Blocks potential data exfiltration via curl, nc, scp, etc.",
  severity: "error",
  events: ["PreToolUse"],
  pack: "security",

  evaluate(ctx) {
    if (ctx.toolName !== "Bash") return [];
    const command = contextCommand(ctx);
    if (!command) return [];

    const allowed = new Set([
      ...DEFAULT_ALLOWED_HOSTS,
      ...stringListOption(ctx, this.id, "allowed_hosts").map((h) => h.toLowerCase()),
    ]);
    const host = extractHost(command);
    if (host && allowed.has(host)) return [];

    const hit = EXFIL_PATTERNS.find((p) => p.re.test(command));
    if (!hit) return [];
    return [
      {
        ruleId: this.id,
        message: `Potential data exfiltration detected via ${hit.label}`,
        severity: this.severity,
        suggestion:
          "Verify this network operation is intentional and not sending sensitive data to an external host.",
      },
    ];
  },
};
