import {
    UnauthenticatedError,
    err,
    ok,
    type IdentityToken,
    type IdentityVerifier,
    type Result
} from '@concierge/core';

/**
 * Accepts any non-empty credential from a configured provider. Suitable when
 * the credential was already verified upstream (e.g. by a sign-in widget
 * behind a trusted proxy).
 */
export class PassthroughIdentityVerifier implements IdentityVerifier {
    public readonly providers: readonly string[];

    public constructor(providers: readonly string[] = ['google']) {
        this.providers = providers;
    }

    public async verify(provider: string, credential: string): Promise<Result<IdentityToken, UnauthenticatedError>> {
        if (!this.providers.includes(provider)) {
            return err(new UnauthenticatedError(`Unsupported identity provider: ${provider}`));
        }
        const token = credential.trim();
        if (!token) {
            return err(new UnauthenticatedError('No user credentials found'));
        }
        return ok({ provider, token });
    }
}
