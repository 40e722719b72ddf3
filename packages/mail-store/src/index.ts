export { MAIL_STORE } from "./mail-store.js";
export type { MailStore, MatchRow, TextSample } from "./mail-store.js";
export {
	StoreUnavailableError,
	toStoreError,
	type StoreErrorCode,
} from "./store.errors.js";
export { PostgresMailStore } from "./postgres/postgres-mail.store.js";
export { headlineOptions, type HeadlineOptions } from "./postgres/schema.js";
export { DatabaseModule, DB_POOL, createPool } from "./database.module.js";
