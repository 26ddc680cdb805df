import packageJson from "../package.json";

export const VERSION: string = typeof packageJson.version === "string" ? packageJson.version : "0.0.0";

export const USER_AGENT = `sitewarden/${VERSION}`;
