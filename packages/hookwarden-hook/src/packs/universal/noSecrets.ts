import path from "node:path";
import { contextCommand, contextFilePath, type Finding, type Rule } from "hookwarden-core";
import { stringListOption } from "../options.js";

const WRITE_TOOLS = new Set(["Write", "Edit"]);

const TOKEN_PREFIXES = [
  "sk_live_",
  "sk_test_",
  "AKIA",
  "ghp_",
  "ghs_",
  "gho_",
  "github_pat_",
  "xoxb-",
  "xoxp-",
  "xoxs-",
  "_authToken",
];

const KEY_VALUE_RE = /(api_key|apikey|secret|password|token|secret_key|private_key|auth_token)\s*=\s*["']([^"']{10,})["']/gi;
const BEARER_RE = /Bearer [a-zA-Z0-9\-_.]{20,}/g;
const PRIVATE_KEY_RE = /-----BEGIN\s+(?:\w+\s+)?PRIVATE KEY-----/;
const GCP_SERVICE_ACCOUNT_RE = /"type"\s*:\s*"service_account"/;
// Greedy password match up to the last @ before the host.
const DB_CONN_RE =
  /(?:postgres(?:ql)?|mysql|mongodb(?:\+srv)?|redis|amqp):\/\/[^:]+:(.+)@(?!localhost\b)(?!127\.0\.0\.1\b)(?!db\b)\S+/gi;
const JWT_RE = /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\b/;
const CURL_AUTH_RE = /\bcurl\b.*(?:-u\s+\S+:\S+|-H\s+["']Authorization:\s+(?:Bearer|Basic)\s+\S+["'])/i;
const TERRAFORM_STATE_RE = /"serial"\s*:\s*\d+[\s\S]*"lineage"/;

const PLACEHOLDER_WORDS = new Set(["test", "example", "placeholder", "xxx", "changeme", "password", "secret"]);
const DB_PLACEHOLDER_PASSWORDS = new Set(["password", "pass", "secret", "changeme", "example", "placeholder"]);
const ENV_REFS = ["os.environ", "process.env", "${"];
const SENSITIVE_FILENAMES = ["credentials", "secrets"];

const ENV_SUGGESTION = "Use environment variables instead of hard-coded secrets.";

function hasEnvRef(value: string): boolean {
  return ENV_REFS.some((ref) => value.includes(ref));
}

export const noSecrets: Rule = {
  id: "no-secrets",
  description: "Prevents writing secrets or credentials into source files",
  severity: "error",
  events: ["PreToolUse"],
  pack: "universal",

  evaluate(ctx) {
    const isBash = ctx.toolName === "Bash";
    if (!isBash && !WRITE_TOOLS.has(ctx.toolName)) return [];

    const filePath = isBash ? undefined : contextFilePath(ctx) ?? undefined;
    const rawContent = isBash ? contextCommand(ctx) : ctx.toolInput.content;
    const content = typeof rawContent === "string" ? rawContent : "";
    const extraPrefixes = stringListOption(ctx, this.id, "extra_prefixes");

    const findings: Finding[] = [];
    const add = (message: string, suggestion: string) =>
      findings.push({ ruleId: this.id, message, severity: this.severity, filePath, suggestion });

    if (filePath) {
      const base = path.basename(filePath).toLowerCase();
      for (const name of SENSITIVE_FILENAMES) {
        if (base.includes(name)) {
          add(
            `Writing to a file with sensitive name: ${filePath}`,
            "Avoid committing files named 'credentials' or 'secrets'.",
          );
        }
      }
    }

    if (!content) return findings;

    for (const prefix of [...TOKEN_PREFIXES, ...extraPrefixes]) {
      if (content.includes(prefix)) {
        add(`Possible secret token detected (prefix '${prefix}')`, ENV_SUGGESTION);
      }
    }

    for (const match of content.matchAll(KEY_VALUE_RE)) {
      const value = match[2] ?? "";
      if (PLACEHOLDER_WORDS.has(value.trim().toLowerCase()) || hasEnvRef(value)) continue;
      add(`Secret assignment detected: ${match[1] ?? ""}=...`, ENV_SUGGESTION);
    }

    for (const match of content.matchAll(BEARER_RE)) {
      if (hasEnvRef(match[0])) continue;
      add("Bearer token detected in content", "Use environment variables instead of hard-coded Bearer tokens.");
    }

    if (PRIVATE_KEY_RE.test(content)) {
      add(
        "Private key detected in content",
        "Never commit private keys. Use a secrets manager or environment variables.",
      );
    }

    if (GCP_SERVICE_ACCOUNT_RE.test(content)) {
      add(
        "Google Cloud service account key detected",
        "Use workload identity or environment variables instead of service account keys.",
      );
    }

    for (const match of content.matchAll(DB_CONN_RE)) {
      const password = match[1] ?? "";
      if (DB_PLACEHOLDER_PASSWORDS.has(password.toLowerCase())) continue;
      add(
        "Database connection string with embedded credentials detected",
        "Use environment variables for database connection strings.",
      );
    }

    if (JWT_RE.test(content)) {
      add(
        "JWT token detected in content",
        "Never hard-code JWT tokens. Use environment variables or a token service.",
      );
    }

    if (isBash && CURL_AUTH_RE.test(content)) {
      add(
        "Curl command with embedded credentials detected",
        "Use environment variables or a credentials file instead of inline credentials.",
      );
    }

    if (TERRAFORM_STATE_RE.test(content)) {
      add(
        "Terraform state file detected (may contain secrets)",
        "Use remote state storage (S3, GCS) instead of committing terraform.tfstate.",
      );
    }

    return findings;
  },
};
