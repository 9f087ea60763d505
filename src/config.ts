/**
 * Defaults for building containers and compacting blocks
 *
 * ACDC_KIND         serialization kind: JSON (default), CBOR or MGPK
 * ACDC_DIGEST_CODE  digest derivation code, default E (Blake3-256)
 */

import { DigDex, isDigestCode, type DigestCode } from './cesr/codex';
import { Kind, isKind } from './versify';
import { err } from './errors';

export interface AcdcConfig {
  kind: Kind;
  code: DigestCode;
}

export const defaultConfig: Readonly<AcdcConfig> = Object.freeze({
  kind: Kind.JSON,
  code: DigDex.Blake3_256,
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AcdcConfig {
  const kind = (env.ACDC_KIND || defaultConfig.kind).trim().toUpperCase();
  const code = (env.ACDC_DIGEST_CODE || defaultConfig.code).trim();

  if (!isKind(kind)) {
    throw err.InvalidField('ACDC_KIND', `unsupported kind '${kind}'`);
  }
  if (!isDigestCode(code)) {
    throw err.InvalidField('ACDC_DIGEST_CODE', `unknown digest code '${code}'`);
  }

  return { kind, code };
}
