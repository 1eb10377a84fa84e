import { describe, expect, test } from "vitest";
import {
  IpRouteGatewayResolver,
  normalizeMac,
  parseDefaultRoute,
  parseNeighbourMac,
} from "../../src/system";
import { createFakeRunner } from "../helpers/fakes";

const ROUTE_OUTPUT = "default via 192.168.1.1 dev wlp2s0 proto dhcp src 192.168.1.23 metric 600\n";
const NEIGH_OUTPUT = "192.168.1.1 lladdr AA:BB:CC:DD:EE:FF REACHABLE\n";

describe("normalizeMac", () => {
  test("lower-cases and unifies separators", () => {
    expect(normalizeMac("AA-BB-CC-DD-EE-FF")).toBe("aa:bb:cc:dd:ee:ff");
    expect(normalizeMac(" aa:bb:cc:dd:ee:0f ")).toBe("aa:bb:cc:dd:ee:0f");
  });

  test("rejects anything that is not a MAC", () => {
    expect(normalizeMac("aa:bb:cc:dd:ee")).toBeNull();
    expect(normalizeMac("zz:bb:cc:dd:ee:ff")).toBeNull();
    expect(normalizeMac("")).toBeNull();
  });
});

describe("parseDefaultRoute", () => {
  test("reads gateway and device", () => {
    expect(parseDefaultRoute(ROUTE_OUTPUT)).toEqual({ gateway: "192.168.1.1", device: "wlp2s0" });
  });

  test("takes the first route with a gateway", () => {
    const output = "default dev tun0 scope link\ndefault via 10.0.0.1 dev eth0\n";
    expect(parseDefaultRoute(output)).toEqual({ gateway: "10.0.0.1", device: "eth0" });
  });

  test("no default route", () => {
    expect(parseDefaultRoute("")).toBeNull();
  });
});

describe("parseNeighbourMac", () => {
  test("reads lladdr", () => {
    expect(parseNeighbourMac(NEIGH_OUTPUT)).toBe("aa:bb:cc:dd:ee:ff");
  });

  test("incomplete entry has no address", () => {
    expect(parseNeighbourMac("192.168.1.1 INCOMPLETE\n")).toBeNull();
  });
});

describe("IpRouteGatewayResolver", () => {
  test("asks ip for the route, then the neighbour entry", async () => {
    const { runner, calls } = createFakeRunner((_command, args) =>
      args[0] === "route" ? { stdout: ROUTE_OUTPUT } : { stdout: NEIGH_OUTPUT },
    );

    const mac = await new IpRouteGatewayResolver(runner).resolveGatewayMac();

    expect(mac).toBe("aa:bb:cc:dd:ee:ff");
    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ["ip", "route", "show", "default"],
      ["ip", "neigh", "show", "192.168.1.1", "dev", "wlp2s0"],
    ]);
  });

  test("null when ip fails", async () => {
    const { runner, calls } = createFakeRunner(() => ({ exitCode: 127, stderr: "not found" }));

    await expect(new IpRouteGatewayResolver(runner).resolveGatewayMac()).resolves.toBeNull();
    expect(calls).toHaveLength(1);
  });

  test("null without a default route", async () => {
    const { runner, calls } = createFakeRunner(() => ({ stdout: "" }));

    await expect(new IpRouteGatewayResolver(runner).resolveGatewayMac()).resolves.toBeNull();
    expect(calls).toHaveLength(1);
  });

  test("null when the neighbour lookup fails", async () => {
    const { runner } = createFakeRunner((_command, args) =>
      args[0] === "route" ? { stdout: ROUTE_OUTPUT } : 1,
    );

    await expect(new IpRouteGatewayResolver(runner).resolveGatewayMac()).resolves.toBeNull();
  });

  test("uses the configured ip binary", async () => {
    const { runner, calls } = createFakeRunner(() => ({ stdout: "" }));

    await new IpRouteGatewayResolver(runner, "/sbin/ip").resolveGatewayMac();

    expect(calls[0]?.command).toBe("/sbin/ip");
  });
});
