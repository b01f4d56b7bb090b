/**
 * Versioned binary container for persisted objects.
 *
 * Layout (big-endian):
 *
 *   magic        4 bytes  "USPJ"
 *   version      u16
 *   kind length  u8
 *   kind         ASCII, e.g. "project"
 *   body length  u32
 *   body         UTF-8 JSON
 *   digest       32 bytes, SHA-256 of body
 */

import { createHash } from 'node:crypto';
import { CorruptContainerError, PreconditionError, fail, ok, type Result } from '../errors.js';

export const CONTAINER_MAGIC = Buffer.from('USPJ', 'ascii');
export const CONTAINER_VERSION = 1;
const DIGEST_BYTES = 32;

export interface DecodedContainer {
  version: number;
  kind: string;
  payload: unknown;
}

function sha256(buf: Buffer): Buffer {
  return createHash('sha256').update(buf).digest();
}

export function encodeContainer(kind: string, payload: unknown): Buffer {
  const kindBytes = Buffer.from(kind, 'ascii');
  if (kindBytes.length === 0 || kindBytes.length > 0xff) {
    throw new PreconditionError(`Container kind must be 1-255 ASCII bytes, got "${kind}"`);
  }
  const body = Buffer.from(JSON.stringify(payload), 'utf8');

  const header = Buffer.alloc(CONTAINER_MAGIC.length + 2 + 1 + kindBytes.length + 4);
  let offset = CONTAINER_MAGIC.copy(header, 0);
  offset = header.writeUInt16BE(CONTAINER_VERSION, offset);
  offset = header.writeUInt8(kindBytes.length, offset);
  offset += kindBytes.copy(header, offset);
  header.writeUInt32BE(body.length, offset);

  return Buffer.concat([header, body, sha256(body)]);
}

export function decodeContainer(bytes: Buffer, source = '<buffer>'): Result<DecodedContainer, CorruptContainerError> {
  const corrupt = (reason: string, cause?: unknown) =>
    fail(new CorruptContainerError(`${source} is not a valid project file: ${reason}`, source, { cause }));

  let offset = 0;
  const take = (n: number): Buffer | undefined => {
    if (offset + n > bytes.length) return undefined;
    const slice = bytes.subarray(offset, offset + n);
    offset += n;
    return slice;
  };

  const magic = take(CONTAINER_MAGIC.length);
  if (!magic || !magic.equals(CONTAINER_MAGIC)) return corrupt('missing container header');

  const versionBytes = take(2);
  if (!versionBytes) return corrupt('truncated header');
  const version = versionBytes.readUInt16BE(0);
  if (version !== CONTAINER_VERSION) {
    return corrupt(`unsupported container version ${version} (expected ${CONTAINER_VERSION})`);
  }

  const kindLength = take(1);
  const kindBytes = kindLength && take(kindLength.readUInt8(0));
  const bodyLength = kindBytes && take(4);
  if (!kindBytes || !bodyLength) return corrupt('truncated header');

  const body = take(bodyLength.readUInt32BE(0));
  if (!body) return corrupt('truncated body');
  const digest = take(DIGEST_BYTES);
  if (!digest) return corrupt('truncated checksum');
  if (offset !== bytes.length) return corrupt(`${bytes.length - offset} unexpected trailing bytes`);
  if (!digest.equals(sha256(body))) return corrupt('checksum mismatch');

  let payload: unknown;
  try {
    payload = JSON.parse(body.toString('utf8'));
  } catch (err) {
    return corrupt('body is not valid JSON', err);
  }
  return ok({ version, kind: kindBytes.toString('ascii'), payload });
}
