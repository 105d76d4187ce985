/**
 * Paradex signer - Quickstart Example
 *
 * Minimal end-to-end flow against testnet:
 * 1. Fetch the system config
 * 2. Derive the account from an Ethereum key
 * 3. Onboard (idempotent)
 * 4. Authenticate
 * 5. Sign and submit a limit order
 *
 * Run: ETH_PRIVATE_KEY=0x... npx tsx examples/quickstart.ts
 */

import {
  Account,
  ApiError,
  Environment,
  getEnvironmentConfig,
  type Header,
  headersToRecord,
  OrderBuilder,
  parseSystemConfig,
} from "../src/index.js";

const { apiBase } = getEnvironmentConfig(Environment.TESTNET);

async function request(
  method: string,
  path: string,
  headers: readonly Header[] = [],
  body?: unknown,
): Promise<unknown> {
  const response = await fetch(`${apiBase}${path}`, {
    method,
    headers: { "Content-Type": "application/json", ...headersToRecord(headers) },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const text = await response.text();
  if (!response.ok) throw new ApiError(response.status, text);
  return text.length > 0 ? JSON.parse(text) : undefined;
}

async function main() {
  const ethPrivateKey = process.env.ETH_PRIVATE_KEY;
  if (!ethPrivateKey) throw new Error("Set ETH_PRIVATE_KEY");

  // 1. System config
  const config = parseSystemConfig(await request("GET", "/system/config"));
  console.log(`L2 chain: ${config.starknet_chain_id}`);

  // 2. Account
  const account = Account.fromL1PrivateKey(config, ethPrivateKey);
  console.log(`L1 address: ${account.l1Address}`);
  console.log(`L2 address: ${account.l2AddressHex()}`);

  // 3. Onboarding
  await account.session.onboard(async () => {
    await request("POST", "/onboarding", account.onboardingHeaders(), {
      public_key: account.l2PublicKeyHex(),
    });
  });
  console.log("Onboarded");

  // 4. Auth
  const authenticate = async () => {
    const result = await request("POST", "/auth", account.authHeaders());
    if (typeof result !== "object" || result === null || !("jwt_token" in result)) {
      throw new Error("Unexpected /auth response");
    }
    return String(result.jwt_token);
  };
  await account.session.ensureFresh(authenticate);
  console.log("Authenticated");

  // 5. Order
  const order = OrderBuilder.create()
    .market("BTC-USD-PERP")
    .side("BUY")
    .type("LIMIT")
    .size("0.001")
    .price("1000") // far below market to avoid a fill
    .instruction("POST_ONLY")
    .build();
  account.signOrder(order);

  await account.session.ensureFresh(authenticate);
  const placed = await request(
    "POST",
    "/orders",
    [account.session.authorizationHeader()],
    order,
  );
  console.log("Order placed:", placed);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
