import { z } from "zod";
import { createLogger } from "hookwarden-core";

const log = createLogger("payload");

const optionalString = () => z.string().optional().catch(undefined);

/**
 * The JSON the agent supervisor sends on stdin. Every field is optional and
 * a field of the wrong type is dropped rather than failing the whole payload.
 */
const HookPayloadSchema = z.object({
  hook_event_name: optionalString(),
  session_id: optionalString(),
  cwd: optionalString(),
  tool_name: optionalString(),
  tool_input: z.record(z.unknown()).optional().catch(undefined),
  prompt: optionalString(),
  subagent_output: optionalString(),
  last_assistant_message: optionalString(),
  notification_type: optionalString(),
  trigger: optionalString(),
  compact_source: optionalString(),
});

export type HookPayload = z.infer<typeof HookPayloadSchema>;

export async function readAllStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8").trim();
}

export function parsePayload(raw: string): HookPayload {
  if (!raw.trim()) return {};

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    log.warning("stdin is not valid JSON; treating payload as empty");
    return {};
  }

  const parsed = HookPayloadSchema.safeParse(value);
  if (!parsed.success) {
    log.warning("stdin payload is not a JSON object; treating payload as empty");
    return {};
  }
  return parsed.data;
}

export function subagentOutput(payload: HookPayload): string | undefined {
  return payload.subagent_output ?? payload.last_assistant_message;
}

export function compactSource(payload: HookPayload): string | undefined {
  return payload.compact_source ?? payload.trigger;
}
