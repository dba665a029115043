import { type IdentityToken } from '../entities/identity';
import { type UnauthenticatedError } from '../errors';
import { type Result } from '../result';

/**
 * Turns a login credential into a verified identity. The protocol behind it
 * (token signature checks, audience, expiry) belongs to the implementation.
 */
export interface IdentityVerifier {
  readonly providers: readonly string[];
  verify(provider: string, credential: string): Promise<Result<IdentityToken, UnauthenticatedError>>;
}
