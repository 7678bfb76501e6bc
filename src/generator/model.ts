import type { GeneratorModel } from "./types";

export const DEFAULT_MODEL: GeneratorModel = {
  severities: [
    ["INFO", 0.7],
    ["NOTICE", 0.1],
    ["WARNING", 0.12],
    ["ERROR", 0.06],
    ["CRITICAL", 0.02],
  ],
  actions: [
    ["ACCEPT", 0.6],
    ["DROP", 0.3],
    ["REJECT", 0.1],
  ],
  protocols: ["TCP", "UDP", "ICMP", "GRE", "ESP"],
  portedProtocols: ["TCP", "UDP"],
  interfaces: ["eth0", "eth1", "wan0", "lan0", "dmz0"],
  servicePorts: [22, 80, 443, 53, 8080, 3389, 5000, 514, 3306, 1433],
  reasons: {
    info: [
      "Connection established",
      "Connection closed",
      "NAT translation success",
      "Policy matched",
      "Session aged out",
      "Health check passed",
    ],
    warning: [
      "Suspicious connection rate",
      "Unexpected packet",
      "Possible policy mismatch",
      "Malformed packet",
      "IP spoofing suspected",
    ],
    error: [
      "Policy violation",
      "Intrusion detected",
      "Configuration error",
      "Resource exhausted",
      "Authentication failure",
      "Firewall rule conflict",
    ],
  },
  host: "fw01.corp.example.com",
  daemon: "firewall",
  meanIntervalSeconds: 1.2,
  sourcePrivateBias: 0.6,
  destinationPrivateBias: 0.3,
};
