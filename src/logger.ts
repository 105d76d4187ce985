/**
 * Debug logging for the signing core.
 *
 * Enable with `DEBUG=paradex:*` (or a single namespace such as
 * `DEBUG=paradex:auth`). Log lines carry addresses, public keys and
 * message hashes only; key material and session tokens are never logged.
 *
 * @module
 */

import debug from "debug";

export const log = {
  account: debug("paradex:account"),
  auth: debug("paradex:auth"),
  keys: debug("paradex:keys"),
  sign: debug("paradex:sign"),
};
