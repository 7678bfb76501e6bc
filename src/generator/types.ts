export type Severity = "INFO" | "NOTICE" | "WARNING" | "ERROR" | "CRITICAL";
export type Action = "ACCEPT" | "DROP" | "REJECT";
export type Protocol = "TCP" | "UDP" | "ICMP" | "GRE" | "ESP";

/** Ordered (label, probability) pairs; probabilities sum to 1.0 */
export type WeightTable<T extends string> = ReadonlyArray<readonly [label: T, weight: number]>;

export interface ReasonPools {
  /** INFO and NOTICE */
  readonly info: readonly string[];
  readonly warning: readonly string[];
  /** ERROR and CRITICAL */
  readonly error: readonly string[];
}

/**
 * Immutable statistical model for synthetic firewall traffic.
 * Swap in an alternate model to change the mix without touching the sampler.
 */
export interface GeneratorModel {
  readonly severities: WeightTable<Severity>;
  readonly actions: WeightTable<Action>;
  readonly protocols: readonly Protocol[];
  /** Protocols that carry ports; all others log port 0 */
  readonly portedProtocols: readonly Protocol[];
  readonly interfaces: readonly string[];
  readonly servicePorts: readonly number[];
  readonly reasons: ReasonPools;
  readonly host: string;
  readonly daemon: string;
  readonly meanIntervalSeconds: number;
  readonly sourcePrivateBias: number;
  readonly destinationPrivateBias: number;
}

export interface LogRecord {
  timestamp: number;
  host: string;
  daemon: string;
  pid: number;
  severity: Severity;
  ruleId: number;
  reason: string;
  protocol: Protocol;
  srcIp: string;
  dstIp: string;
  srcPort: number;
  dstPort: number;
  inInterface: string;
  outInterface: string;
  action: Action;
  bytes: number;
  packets: number;
  uid: string;
}

export interface GenerateOptions {
  count: number;
  outPath: string;
  /** Epoch ms of the clock before the first record; defaults to now */
  startTime?: number;
  seed?: number;
  /** Accepted and validated; has no effect on the timing model */
  burstiness?: number;
}

export interface GenerateResult {
  outPath: string;
  count: number;
  seed: number;
}
