import type { Random } from "@/lib/random";

interface Ipv4Block {
  cidr: string;
  base: number;
  prefix: number;
}

function block(cidr: string): Ipv4Block {
  const [address, prefix] = cidr.split("/");
  return { cidr, base: ipv4ToNumber(address), prefix: Number(prefix) };
}

/** Private ranges, in the order they are offered to the biased draw */
export const RESERVED_BLOCKS: readonly Ipv4Block[] = [
  block("10.0.0.0/8"),
  block("192.168.0.0/16"),
  block("172.16.0.0/12"),
];

export function ipv4ToNumber(address: string): number {
  const octets = address.split(".").map(Number);
  if (octets.length !== 4 || octets.some((o) => !Number.isInteger(o) || o < 0 || o > 255)) {
    throw new RangeError(`Not an IPv4 address: ${address}`);
  }
  return ((octets[0] * 256 + octets[1]) * 256 + octets[2]) * 256 + octets[3];
}

export function numberToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join(".");
}

function isReservedOctets(a: number, b: number): boolean {
  return a === 10 || (a === 192 && b === 168) || (a === 172 && b >= 16 && b <= 31);
}

/** True when the address lies in 10/8, 172.16/12 or 192.168/16 */
export function isReservedIpv4(address: string): boolean {
  const value = ipv4ToNumber(address);
  return isReservedOctets(Math.floor(value / 2 ** 24), Math.floor(value / 2 ** 16) % 256);
}

/**
 * Draw a random IPv4 address.
 *
 * With probability `privateBias` the address is a host inside one of the
 * reserved blocks (never the network or broadcast address). Otherwise it is a
 * public-looking address, redrawn until it falls outside every reserved block.
 */
export function randomIpv4(rng: Random, privateBias: number = 0.6): string {
  if (rng.next() < privateBias) {
    const net = rng.pick(RESERVED_BLOCKS);
    const size = 2 ** (32 - net.prefix);
    return numberToIpv4(net.base + rng.int(1, size - 2));
  }

  for (;;) {
    const a = rng.int(1, 254);
    const b = rng.int(0, 254);
    const c = rng.int(0, 254);
    const d = rng.int(1, 254);
    if (!isReservedOctets(a, b)) {
      return `${a}.${b}.${c}.${d}`;
    }
  }
}
