export {
  MailClient,
  createClientFromEnv,
  SMTP_SUBMISSION_PORT,
  IMAP_TLS_PORT,
} from "./client.js";
export {
  INBOX,
  buildSearchCriterion,
  formatSearchCriterion,
  pickLatestUid,
} from "./search.js";
export {
  buildMailOptions,
  buildMimeMessage,
  renderMimeMessage,
  toInboundMessage,
} from "./message.js";
export {
  NoMatchingMessageError,
  MessageFetchError,
  describeMailError,
} from "./errors.js";
export type { MailProtocol } from "./errors.js";
export type {
  Credentials,
  ServerConfig,
  MailClientConfig,
  OutgoingMessage,
  InboundMessage,
} from "./types.js";
