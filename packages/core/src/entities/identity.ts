/**
 * A credential the identity verifier accepted. The token is forwarded as-is
 * to downstream services that scope data by user.
 */
export interface IdentityToken {
  provider: string;
  token: string;
}
