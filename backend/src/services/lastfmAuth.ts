import type { AxiosInstance } from "axios";
import { z } from "zod";
import { ErrorCategory, ErrorCode } from "../utils/errors";
import { createLastFmClient, postLastFm, type LastFmCredentials } from "./lastfm";
import { ScrobblerError } from "./scrobblers";

export const LASTFM_AUTH_URL = "https://www.last.fm/api/auth/";

export type LastFmAppCredentials = Pick<LastFmCredentials, "apiKey" | "apiSecret">;

const tokenResponseSchema = z.object({ token: z.string().min(1) });
const sessionResponseSchema = z.object({
    session: z.object({
        name: z.string().optional(),
        key: z.string().min(1),
    }),
});

function missingField(method: string, field: string): ScrobblerError {
    return new ScrobblerError(
        "lastfm",
        ErrorCode.SERVICE_REJECTED,
        ErrorCategory.FATAL,
        `${method} failed: no ${field} in Last.fm response`
    );
}

/** Step 1 of the desktop auth flow: an unauthorized request token. */
export async function getToken(
    credentials: LastFmAppCredentials,
    client: AxiosInstance = createLastFmClient()
): Promise<string> {
    const data = await postLastFm(client, "lastfm", "auth.getToken", {}, credentials);
    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw missingField("auth.getToken", "token");
    }
    return parsed.data.token;
}

/** Step 2: the page where the user grants access to the token. */
export function buildAuthorizationUrl(apiKey: string, token: string): string {
    const url = new URL(LASTFM_AUTH_URL);
    url.searchParams.set("api_key", apiKey);
    url.searchParams.set("token", token);
    return url.toString();
}

/** Step 3: trade the authorized token for a session key that never expires. */
export async function getSession(
    credentials: LastFmAppCredentials,
    token: string,
    client: AxiosInstance = createLastFmClient()
): Promise<string> {
    const data = await postLastFm(
        client,
        "lastfm",
        "auth.getSession",
        { token },
        credentials
    );
    const parsed = sessionResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw missingField("auth.getSession", "session key");
    }
    return parsed.data.session.key;
}
