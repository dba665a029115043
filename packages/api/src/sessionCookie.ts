import { SESSION_DEFAULTS } from '@concierge/core';
import { type CookieOptions, type Request, type Response } from 'express';

export interface SessionCookieOptions {
    name?: string;
    secure?: boolean;
}

/** Signed, HTTP-only cookie carrying the opaque session identifier. */
export class SessionCookie {
    private readonly name: string;
    private readonly options: CookieOptions;

    public constructor(options: SessionCookieOptions = {}) {
        this.name = options.name ?? SESSION_DEFAULTS.COOKIE_NAME;
        this.options = {
            signed: true,
            httpOnly: true,
            sameSite: 'lax',
            secure: options.secure ?? false,
            path: '/'
        };
    }

    public read(req: Request): string | null {
        const value: unknown = req.signedCookies?.[this.name];
        return typeof value === 'string' && value.length > 0 ? value : null;
    }

    public write(res: Response, sessionId: string): void {
        res.cookie(this.name, sessionId, this.options);
    }

    public clear(res: Response): void {
        const { signed: _signed, ...options } = this.options;
        res.clearCookie(this.name, options);
    }
}
