export type { Authorizer, CallerCredential } from "./types.js";
export { credentialLabel, isIssuedCredential, issueCredential } from "./credentials.js";
export { Allowlist } from "./access-control.js";
