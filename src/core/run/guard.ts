/**
 * Network guard: only back up behind known gateways
 */

import { NetworkPolicyError } from "../../errors";
import { type GatewayResolver, normalizeMac } from "../../system/gateway";
import type { NetworkConfig } from "../../types";
import { logger } from "../../utils/logger";

/**
 * True iff `mac` is a hardware address present in the whitelist, ignoring
 * case and `:`/`-` separators. A missing gateway is never allowed.
 */
export function isGatewayAllowed(mac: string | null, whitelist: string[]): boolean {
  if (mac === null) return false;
  const observed = normalizeMac(mac);
  if (observed === null) return false;
  return whitelist.some((entry) => normalizeMac(entry) === observed);
}

/**
 * Resolve the gateway and enforce the whitelist. Returns the observed MAC,
 * or null when the check is disabled.
 */
export async function checkNetwork(
  network: NetworkConfig,
  resolver: GatewayResolver,
): Promise<string | null> {
  if (!network.enabled) {
    logger.warn("Network check disabled for this profile");
    return null;
  }

  const mac = await resolver.resolveGatewayMac();
  if (mac === null) {
    throw new NetworkPolicyError("Could not determine the default gateway; refusing to back up");
  }

  if (!isGatewayAllowed(mac, network.allowedGateways)) {
    throw new NetworkPolicyError(`Gateway ${mac} is not in the allowed list; refusing to back up`);
  }

  logger.info(`Gateway ${mac} is allowed`);
  return mac;
}
