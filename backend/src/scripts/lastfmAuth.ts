/**
 * Obtain a Last.fm session key and store it in the config file.
 *
 * Usage:
 *   LASTFM_API_KEY=... LASTFM_API_SECRET=... npm run lastfm:auth
 *
 * The key and secret fall back to the values already in the config file.
 */

import { createInterface } from "readline/promises";
import { loadConfig, resolveConfigPath, saveConfig } from "../config";
import { buildAuthorizationUrl, getSession, getToken } from "../services/lastfmAuth";
import { errorMessage } from "../utils/errors";

async function main() {
    const configPath = resolveConfigPath();
    const config = await loadConfig(configPath);

    const apiKey = process.env.LASTFM_API_KEY?.trim() || config.lastfm?.apiKey || "";
    const apiSecret =
        process.env.LASTFM_API_SECRET?.trim() || config.lastfm?.apiSecret || "";
    if (!apiKey || !apiSecret) {
        console.error(
            "Set LASTFM_API_KEY and LASTFM_API_SECRET (https://www.last.fm/api/account/create)"
        );
        process.exit(1);
    }

    console.log("Requesting authorization token...");
    const token = await getToken({ apiKey, apiSecret });

    console.log("\nAuthorize this application in your browser:");
    console.log(`  ${buildAuthorizationUrl(apiKey, token)}\n`);

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
        await rl.question("Press Enter once you have granted access...");
    } finally {
        rl.close();
    }

    console.log("Exchanging token for a session key...");
    const sessionKey = await getSession({ apiKey, apiSecret }, token);

    config.lastfm = { enabled: true, apiKey, apiSecret, sessionKey };
    await saveConfig(config, configPath);
    console.log(`Last.fm enabled; session key saved to ${configPath}`);
}

main().catch((error) => {
    console.error(`Last.fm authentication failed: ${errorMessage(error)}`);
    process.exit(1);
});
