import { ConfigStore } from "../store/config-store"

/**
 * Parses sysctl-style `key = value` text into a new store.
 *
 * @throws ParseError for the first malformed line; no store is returned in that case.
 */
export function parse(text: string): ConfigStore {
  return new ConfigStore().parse(text)
}
