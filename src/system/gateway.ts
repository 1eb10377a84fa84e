/**
 * Default gateway discovery via iproute2
 */

import { logger } from "../utils/logger";
import { type CommandRunner, runCommand } from "./process";

export interface GatewayResolver {
  /** MAC address of the default gateway, or null when it cannot be determined */
  resolveGatewayMac(): Promise<string | null>;
}

export interface DefaultRoute {
  gateway: string;
  device: string;
}

const MAC_PATTERN = /^([0-9a-f]{2}:){5}[0-9a-f]{2}$/;

/**
 * Lower-case a MAC address and unify `-` separators to `:`.
 * Returns null for anything that is not a 48-bit hardware address.
 */
export function normalizeMac(mac: string): string | null {
  const normalized = mac.trim().toLowerCase().replace(/-/g, ":");
  return MAC_PATTERN.test(normalized) ? normalized : null;
}

/**
 * Parse `ip route show default`, taking the first route that names a gateway
 */
export function parseDefaultRoute(output: string): DefaultRoute | null {
  for (const line of output.split("\n")) {
    const match = line.match(/^default\s+via\s+(\S+)\s+dev\s+(\S+)/);
    if (match?.[1] && match[2]) {
      return { gateway: match[1], device: match[2] };
    }
  }
  return null;
}

/**
 * Parse `ip neigh show <ip> dev <dev>` for the link-layer address
 */
export function parseNeighbourMac(output: string): string | null {
  for (const line of output.split("\n")) {
    const match = line.match(/\blladdr\s+(\S+)/);
    if (match?.[1]) {
      return normalizeMac(match[1]);
    }
  }
  return null;
}

export class IpRouteGatewayResolver implements GatewayResolver {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly ipBinary: string = "ip",
  ) {}

  async resolveGatewayMac(): Promise<string | null> {
    const routeResult = await this.run(this.ipBinary, ["route", "show", "default"]);
    if (!routeResult.success) {
      logger.debug(`ip route failed (${routeResult.exitCode}): ${routeResult.stderr}`);
      return null;
    }

    const route = parseDefaultRoute(routeResult.stdout);
    if (!route) {
      logger.debug("No default route with a gateway");
      return null;
    }

    const neighResult = await this.run(this.ipBinary, [
      "neigh",
      "show",
      route.gateway,
      "dev",
      route.device,
    ]);
    if (!neighResult.success) {
      logger.debug(`ip neigh failed (${neighResult.exitCode}): ${neighResult.stderr}`);
      return null;
    }

    const mac = parseNeighbourMac(neighResult.stdout);
    logger.debug(`Gateway ${route.gateway} on ${route.device}: ${mac ?? "no link-layer address"}`);
    return mac;
  }
}
