import { Err, Ok, type Result } from "slang-ts";
import type { ZodError } from "zod";
import { DecodeError, EncodingError } from "./errors.ts";
import {
  type Command,
  commandSchema,
  type InboundMessage,
  KNOWN_INBOUND_OPCODES,
  MAX_FRAME_BYTES,
  parseCommandFrame,
  parseInboundFrame,
  toCommandFrame,
} from "./wire.ts";

/**
 * Formats zod issues as "path: message" pairs.
 */
function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join(", ");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonObject(
  raw: string
): Result<Record<string, unknown>, DecodeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new DecodeError(`Frame is not valid JSON: ${reason}`));
  }
  if (!isRecord(parsed)) {
    return Err(new DecodeError("Frame is not a JSON object"));
  }
  return Ok(parsed);
}

/**
 * Serializes a command to its wire text, tagged with a request counter.
 * The command is validated first; nothing is produced for invalid input.
 *
 * @param command - Command to encode
 * @param req - Per-connection request counter
 * @returns The JSON text, or an EncodingError describing the violation
 *
 * @example
 * ```ts
 * const frame = encodeCommand({ kind: "msg", text: "hello" }, 3);
 * if (frame.isOk) await transport.send(frame.value);
 * ```
 */
export function encodeCommand(
  command: Command,
  req: number
): Result<string, EncodingError> {
  const validation = commandSchema.safeParse(command);
  if (!validation.success) {
    return Err(new EncodingError(command.kind, formatIssues(validation.error)));
  }

  const text = JSON.stringify(toCommandFrame(validation.data, req));
  const size = Buffer.byteLength(text, "utf8");
  if (size > MAX_FRAME_BYTES) {
    return Err(
      new EncodingError(
        command.kind,
        `encoded frame is ${size} bytes, limit is ${MAX_FRAME_BYTES}`
      )
    );
  }
  return Ok(text);
}

/**
 * Parses one inbound frame. Never throws.
 * Frames with an opcode the client does not model decode to `unknown`
 * so that callers can still observe them.
 *
 * @param raw - Text payload of a websocket message
 */
export function decodeFrame(raw: string): Result<InboundMessage, DecodeError> {
  const json = parseJsonObject(raw);
  if (json.isErr) return Err(json.error);
  const payload = json.value;

  const opcode = payload.tc;
  if (typeof opcode !== "string") {
    return Err(new DecodeError("Frame has no 'tc' opcode"));
  }
  if (!KNOWN_INBOUND_OPCODES.has(opcode)) {
    const { tc: _opcode, ...rest } = payload;
    return Ok({ kind: "unknown", opcode, payload: rest });
  }

  const parsed = parseInboundFrame(payload);
  if (!parsed.success) {
    return Err(
      new DecodeError(
        `Frame '${opcode}' is malformed: ${formatIssues(parsed.error)}`,
        opcode
      )
    );
  }
  return Ok(parsed.data);
}

/**
 * Parses an outbound frame back into its command.
 * Used to inspect traffic; `encodeCommand(command, req)` reproduces the frame.
 *
 * @param raw - Text produced by encodeCommand
 */
export function decodeCommand(
  raw: string
): Result<{ req: number; command: Command }, DecodeError> {
  const json = parseJsonObject(raw);
  if (json.isErr) return Err(json.error);

  const parsed = parseCommandFrame(json.value);
  if (!parsed.success) {
    const opcode = typeof json.value.tc === "string" ? json.value.tc : null;
    return Err(
      new DecodeError(
        `Command frame is malformed: ${formatIssues(parsed.error)}`,
        opcode
      )
    );
  }
  return Ok(parsed.data);
}
