/**
 * Strict deserialization of `tailscale status --json` output.
 *
 * The schema fails closed: missing identity fields, wrong types, or an
 * unparseable route make the whole document a {@link ParseError} rather than
 * a partially-filled state. Unknown keys are dropped.
 *
 * @module overlay/raw-parser
 */
import { z } from 'zod';
import { isValidRoute } from './cidr.js';
import { ParseError } from './errors.js';

const RouteListSchema = z
  .array(z.string().refine(isValidRoute, { message: 'invalid CIDR' }))
  .nullish()
  .transform((routes) => routes ?? []);

const StringListSchema = z
  .array(z.string())
  .nullish()
  .transform((items) => items ?? []);

export const RawPeerSchema = z.object({
  ID: z.string().min(1),
  HostName: z.string(),
  DNSName: z.string().default(''),
  OS: z.string().default(''),
  TailscaleIPs: StringListSchema,
  AllowedIPs: RouteListSchema,
  PrimaryRoutes: RouteListSchema,
  AdvertisedRoutes: RouteListSchema,
  Tags: StringListSchema,
  Online: z.boolean().default(false),
  LastSeen: z.string().optional(),
  ExitNode: z.boolean().default(false),
  ExitNodeOption: z.boolean().default(false),
});

export type RawPeer = z.infer<typeof RawPeerSchema>;

export const RawStatusSchema = z.object({
  Version: z.string().optional(),
  BackendState: z.string(),
  Self: RawPeerSchema,
  Peer: z
    .record(z.string(), RawPeerSchema)
    .nullish()
    .transform((peers) => peers ?? {}),
  MagicDNSSuffix: z.string().optional(),
  CurrentTailnet: z
    .object({
      Name: z.string(),
      MagicDNSSuffix: z.string().optional(),
    })
    .nullish(),
});

export type RawStatus = z.infer<typeof RawStatusSchema>;

export type ParseResult = { success: true; data: RawStatus } | { success: false; error: ParseError };

const decoder = new TextDecoder('utf-8', { fatal: true });

/** Deserialize raw agent output into a validated {@link RawStatus}. */
export function parseStatus(bytes: Uint8Array): ParseResult {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch {
    return { success: false, error: new ParseError('agent output is not valid UTF-8') };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { success: false, error: new ParseError(`agent output is not valid JSON: ${detail}`) };
  }

  const result = RawStatusSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    return {
      success: false,
      error: new ParseError(`agent status does not match schema (${issues[0]})`, issues),
    };
  }
  return { success: true, data: result.data };
}
