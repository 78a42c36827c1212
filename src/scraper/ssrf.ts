/**
 * Scraper — SSRF protection.
 *
 * Resolves a validated URL's hostname and rejects it unless every address
 * the resolver returns is public. Each address goes through two checks:
 *   1. the configured blocked-prefix table (fast path)
 *   2. classification against the special-purpose IPv4/IPv6 ranges
 *      (authoritative; catches what the prefix table misses)
 */

import { lookup } from "node:dns/promises";
import { BlockList, isIP } from "node:net";
import { createLogger } from "../utils/logger.js";

const log = createLogger("SsrfGuard");

// ── Types ──────────────────────────────────────────────────────

export interface ResolvedAddress {
    address: string;
    family: 4 | 6;
}

/** Resolves a hostname to every address of both families. */
export type HostResolver = (hostname: string) => Promise<ResolvedAddress[]>;

export type AddressCategory =
    | "loopback"
    | "private"
    | "link-local"
    | "unspecified"
    | "reserved"
    | "multicast";

export type SsrfRule = "dns-unresolvable" | "blocked-prefix" | "restricted-address";

export type SsrfCheck =
    | { safe: true; hostname: string; addresses: string[] }
    | { safe: false; hostname: string; rule: SsrfRule; reason: string; address?: string };

export interface SsrfGuardConfig {
    blockedIpPrefixes: readonly string[];
    resolver?: HostResolver;
}

// ── Address classification ─────────────────────────────────────

type Subnet = readonly [network: string, prefix: number];

const RANGES: Record<AddressCategory, { v4: Subnet[]; v6: Subnet[] }> = {
    "loopback": {
        v4: [["127.0.0.0", 8]],
        v6: [["::1", 128]],
    },
    "unspecified": {
        v4: [["0.0.0.0", 8]],
        v6: [["::", 128]],
    },
    "private": {
        v4: [["10.0.0.0", 8], ["172.16.0.0", 12], ["192.168.0.0", 16], ["100.64.0.0", 10]],
        v6: [["fc00::", 7]],
    },
    "link-local": {
        v4: [["169.254.0.0", 16]],
        v6: [["fe80::", 10]],
    },
    "reserved": {
        v4: [
            ["192.0.0.0", 24],      // IETF protocol assignments
            ["192.0.2.0", 24],      // TEST-NET-1
            ["198.18.0.0", 15],     // benchmarking
            ["198.51.100.0", 24],   // TEST-NET-2
            ["203.0.113.0", 24],    // TEST-NET-3
            ["240.0.0.0", 4],       // future use + broadcast
        ],
        v6: [
            ["::", 8],              // IPv4-compatible, mapped and NAT64 (64:ff9b::/96)
            ["100::", 64],          // discard-only
            ["2001::", 23],         // IETF protocol assignments
            ["2001:db8::", 32],     // documentation
            ["fec0::", 10],         // deprecated site-local
        ],
    },
    "multicast": {
        v4: [["224.0.0.0", 4]],
        v6: [["ff00::", 8]],
    },
};

const CHECK_ORDER: AddressCategory[] = [
    "loopback", "unspecified", "private", "link-local", "reserved", "multicast",
];

const CATEGORY_LISTS = CHECK_ORDER.map((category): [AddressCategory, BlockList] => {
    const list = new BlockList();
    for (const [network, prefix] of RANGES[category].v4) list.addSubnet(network, prefix, "ipv4");
    for (const [network, prefix] of RANGES[category].v6) list.addSubnet(network, prefix, "ipv6");
    return [category, list];
});

const IPV4_MAPPED_RE = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/**
 * Classify an IP literal. Returns the restricted category it falls in, or
 * `null` for a public address. IPv4-mapped IPv6 addresses in dotted form are
 * classified by their embedded IPv4 address; the rest of `::/8` and the
 * NAT64 prefix are reserved. Anything that is not an IP literal is reported
 * as reserved.
 */
export function classifyAddress(address: string): AddressCategory | null {
    const mapped = IPV4_MAPPED_RE.exec(address);
    const candidate = mapped?.[1] ?? address;
    const family = isIP(candidate);
    if (family === 0) return "reserved";

    const type = family === 4 ? "ipv4" : "ipv6";
    for (const [category, list] of CATEGORY_LISTS) {
        if (list.check(candidate, type)) return category;
    }
    return null;
}

// ── Resolver ───────────────────────────────────────────────────

/** System resolver: every A and AAAA answer, in resolver order. */
export const systemResolver: HostResolver = async (hostname) => {
    const answers = await lookup(hostname, { all: true, verbatim: true });
    return answers
        .filter((a) => a.family === 4 || a.family === 6)
        .map((a): ResolvedAddress => ({ address: a.address, family: a.family === 4 ? 4 : 6 }));
};

function stripBrackets(hostname: string): string {
    return hostname.startsWith("[") && hostname.endsWith("]") ? hostname.slice(1, -1) : hostname;
}

// ── Guard ──────────────────────────────────────────────────────

export class SsrfGuard {
    private readonly prefixes: string[];
    private readonly resolve: HostResolver;

    constructor(config: SsrfGuardConfig) {
        this.prefixes = config.blockedIpPrefixes.map((p) => p.toLowerCase());
        this.resolve = config.resolver ?? systemResolver;
    }

    /**
     * Check a URL that already passed validation. Fails closed: a lookup
     * error or an empty answer rejects the URL.
     */
    async check(url: URL): Promise<SsrfCheck> {
        const hostname = stripBrackets(url.hostname);
        if (!hostname) {
            return { safe: false, hostname, rule: "dns-unresolvable", reason: "Cannot resolve hostname from URL" };
        }

        let resolved: ResolvedAddress[];
        try {
            resolved = await this.resolve(hostname);
        } catch (err) {
            log.warn(`DNS resolution failed for ${hostname}: ${err instanceof Error ? err.message : String(err)}`);
            return { safe: false, hostname, rule: "dns-unresolvable", reason: `Cannot resolve hostname: ${hostname}` };
        }

        if (resolved.length === 0) {
            log.warn(`DNS returned no addresses for ${hostname}`);
            return { safe: false, hostname, rule: "dns-unresolvable", reason: `Cannot resolve hostname: ${hostname}` };
        }

        for (const { address } of resolved) {
            const lowered = address.toLowerCase();

            const prefix = this.prefixes.find((p) => lowered.startsWith(p));
            if (prefix) {
                log.warn(`Blocked ${hostname} → ${address}`, { rule: "blocked-prefix", prefix });
                return {
                    safe: false, hostname, address,
                    rule: "blocked-prefix",
                    reason: "Access to internal network addresses is not allowed",
                };
            }

            const category = classifyAddress(lowered);
            if (category) {
                log.warn(`Blocked ${hostname} → ${address}`, { rule: "restricted-address", category });
                return {
                    safe: false, hostname, address,
                    rule: "restricted-address",
                    reason: `Access to ${category} network addresses is not allowed`,
                };
            }
        }

        log.debug(`Cleared ${hostname}`, { addresses: resolved.length });
        return { safe: true, hostname, addresses: resolved.map((r) => r.address) };
    }
}
