export { InMemoryMailStore } from "./in-memory-mail.store.js";
