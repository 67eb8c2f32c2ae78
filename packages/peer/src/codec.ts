import { z } from 'zod';
import type {
  CommandData,
  HandshakeFrame,
  RemoteCommand,
  RemoteCommandType,
} from '@companion-remote/shared';

const commandValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const envelopeSchema = z.object({
  type: z.string().min(1),
});

const authFrameSchema = z.object({
  type: z.literal('auth'),
  sessionId: z.string().optional(),
  pin: z.string().optional(),
  deviceName: z.string().optional(),
  platform: z.string().optional(),
});

const authFailedFrameSchema = z.object({
  type: z.literal('authFailed'),
  message: z.string().optional(),
});

const commandFrameSchema = z.object({
  type: z.string().min(1),
  data: z.record(commandValueSchema).optional(),
});

export type AuthRequest = Omit<z.infer<typeof authFrameSchema>, 'type'>;

export type DecodedFrame =
  | { kind: 'auth'; auth: AuthRequest }
  | { kind: 'authSuccess' }
  | { kind: 'authFailed'; message: string | undefined }
  | { kind: 'command'; command: RemoteCommand };

export type DecodeResult = { ok: true; frame: DecodedFrame } | { ok: false; error: string };

const UNACKNOWLEDGED_TYPES: ReadonlySet<RemoteCommandType> = new Set([
  'ping',
  'pong',
  'ack',
  'deviceInfo',
]);

export function createCommand(type: RemoteCommandType, data?: CommandData): RemoteCommand {
  const command: RemoteCommand = data ? { type, data: Object.freeze({ ...data }) } : { type };
  return Object.freeze(command);
}

/**
 * Liveness and identity traffic is never acknowledged, otherwise two peers
 * would keep acking each other's acks.
 */
export function requiresAck(type: RemoteCommandType): boolean {
  return !UNACKNOWLEDGED_TYPES.has(type);
}

export function encodeCommand(command: RemoteCommand): string {
  return JSON.stringify(
    command.data ? { type: command.type, data: command.data } : { type: command.type }
  );
}

export function encodeHandshake(frame: HandshakeFrame): string {
  return JSON.stringify(frame);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function decodeFrame(text: string): DecodeResult {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    return { ok: false, error: `Invalid frame: ${formatIssues(envelope.error)}` };
  }

  switch (envelope.data.type) {
    case 'auth': {
      const parsed = authFrameSchema.safeParse(json);
      if (!parsed.success) {
        return { ok: false, error: `Invalid auth frame: ${formatIssues(parsed.error)}` };
      }
      const { sessionId, pin, deviceName, platform } = parsed.data;
      return { ok: true, frame: { kind: 'auth', auth: { sessionId, pin, deviceName, platform } } };
    }
    case 'authSuccess':
      return { ok: true, frame: { kind: 'authSuccess' } };
    case 'authFailed': {
      const parsed = authFailedFrameSchema.safeParse(json);
      if (!parsed.success) {
        return { ok: false, error: `Invalid authFailed frame: ${formatIssues(parsed.error)}` };
      }
      return { ok: true, frame: { kind: 'authFailed', message: parsed.data.message } };
    }
    default: {
      const parsed = commandFrameSchema.safeParse(json);
      if (!parsed.success) {
        return { ok: false, error: `Invalid command frame: ${formatIssues(parsed.error)}` };
      }
      return {
        ok: true,
        frame: { kind: 'command', command: createCommand(parsed.data.type, parsed.data.data) },
      };
    }
  }
}
