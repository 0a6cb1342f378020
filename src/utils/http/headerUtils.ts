import { APP_NAME, APP_VERSION } from "../../constants/app.js";

interface BackendHeaders {
  "Content-Type": string;
  "Accept": string;
  "Authorization": string;
  "User-Agent": string;
  [key: string]: string;
}

/**
 * Headers for every backend call. Client headers are never forwarded.
 */
export function buildBackendHeaders(apiKey: string): BackendHeaders {
  return {
    "Content-Type": "application/json",
    "Accept": "application/json",
    "Authorization": `Bearer ${apiKey}`,
    "User-Agent": `${APP_NAME}/${APP_VERSION}`,
  };
}

/**
 * Copy of the headers that is safe to log
 */
export function maskHeaders(headers: Record<string, string>): Record<string, string> {
  const masked: Record<string, string> = { ...headers };
  if (masked["Authorization"] !== undefined) {
    masked["Authorization"] = "Bearer ********";
  }
  return masked;
}
