import { randomBytes } from "node:crypto";

// Output must be unpredictable: session keys are bearer credentials.
export function randomToken(byteLength: number): string {
  return randomBytes(byteLength).toString("base64url");
}
