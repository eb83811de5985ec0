export { SqliteCredentialRepository } from "./credentials.js";
export { SqliteMessageRepository } from "./messages.js";
export { SqlitePrincipalRepository } from "./principals.js";
