export const BRAND_NAME = "nowscrobble";
export const BRAND_SLUG = "nowscrobble";

export const BRAND_VERSION = process.env.npm_package_version || "1.0.0";
export const BRAND_USER_AGENT = `${BRAND_NAME}/${BRAND_VERSION}`;
