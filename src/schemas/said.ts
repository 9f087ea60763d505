/**
 * SAID (Self-Addressing IDentifier) derivation for schemas
 *
 * Implements RFC 8785 (JSON Canonicalization Scheme) + SAID placeholder
 *
 * @see https://datatracker.ietf.org/doc/html/draft-ssmith-said
 * @see https://www.rfc-editor.org/rfc/rfc8785.html
 */

import { canonicalize } from 'json-canonicalize';
import { DigDex, type DigestCode } from '../cesr/codex';
import { Diger } from '../cesr/diger';
import { isAcdcError } from '../errors';
import { placeholder } from '../saidify';
import { s, type SAID } from '../types';

/**
 * Compute SAID for a schema document
 *
 * Steps:
 * 1. Place a placeholder of the digest's length in the $id field
 * 2. Canonicalize using JCS (RFC 8785)
 * 3. Hash the canonical bytes (Blake3-256 by default)
 * 4. Return the CESR qb64 digest
 */
export function deriveSchemaSaid(schema: object, code: DigestCode = DigDex.Blake3_256): SAID {
  const canonical = canonicalize({ ...schema, $id: placeholder(code) });
  return s(new Diger({ ser: canonical, code }).qb64).asSAID();
}

/**
 * Embed SAID into schema's $id field (saidify)
 */
export function saidifySchema<T extends object>(schema: T, code?: DigestCode): T & { $id: SAID } {
  const said = deriveSchemaSaid(schema, code);
  return { ...schema, $id: said };
}

/**
 * Verify that a schema's $id matches its computed SAID
 *
 * The digest code is taken from the $id itself.
 */
export function verifySchemaSaid(schema: object): boolean {
  const id = '$id' in schema ? schema.$id : undefined;
  if (typeof id !== 'string' || id.length === 0) {
    return false;
  }

  let expected: Diger;
  try {
    expected = new Diger({ qb64: id });
  } catch (error) {
    if (isAcdcError(error)) {
      return false;
    }
    throw error;
  }
  return expected.compare(deriveSchemaSaid(schema, expected.code));
}
