import type { Random } from "@/lib/random";
import { formatSyslogTimestamp } from "@/lib/time";
import { randomIpv4 } from "./address";
import { weightedChoice } from "./sampling";
import type { GeneratorModel, LogRecord, Severity } from "./types";

/** CR, LF, TAB, VT, FF */
const CONTROL_CHARS = /[\r\n\t\v\f]/g;

export function stripControlChars(text: string): string {
  return text.replace(CONTROL_CHARS, "");
}

function reasonPool(severity: Severity, model: GeneratorModel): readonly string[] {
  switch (severity) {
    case "INFO":
    case "NOTICE":
      return model.reasons.info;
    case "WARNING":
      return model.reasons.warning;
    case "ERROR":
    case "CRITICAL":
      return model.reasons.error;
  }
}

/**
 * Draw one synthetic firewall record at the given timestamp.
 * The draw order is fixed; changing it changes every seeded fixture.
 */
export function makeRecord(
  timestamp: number,
  pid: number,
  rng: Random,
  model: GeneratorModel
): LogRecord {
  const severity = weightedChoice(model.severities, rng);
  const protocol = rng.pick(model.protocols);
  const ported = model.portedProtocols.includes(protocol);
  const srcIp = randomIpv4(rng, model.sourcePrivateBias);
  const dstIp = randomIpv4(rng, model.destinationPrivateBias);
  const srcPort = ported ? rng.int(1, 65535) : 0;
  const dstPort = ported ? rng.pick(model.servicePorts) : 0;
  const inInterface = rng.pick(model.interfaces);
  const outInterface = rng.pick(model.interfaces);
  const action = weightedChoice(model.actions, rng);
  const bytes = rng.int(0, 15000);
  const packets = bytes > 0 ? Math.max(1, Math.floor(bytes / rng.int(60, 120))) : rng.int(0, 4);
  const ruleId = rng.int(100, 3999);
  const uid = rng.hex(8);
  const reason = rng.pick(reasonPool(severity, model));

  return {
    timestamp,
    host: model.host,
    daemon: model.daemon,
    pid,
    severity,
    ruleId,
    reason,
    protocol,
    srcIp,
    dstIp,
    srcPort,
    dstPort,
    inInterface,
    outInterface,
    action,
    bytes,
    packets,
    uid,
  };
}

/** Render a record as one syslog line, without the line terminator. */
export function formatRecord(record: LogRecord): string {
  const message =
    `%FW-${record.severity}-*.${record.ruleId}: ${record.reason}; ` +
    `src=${record.srcIp} dst=${record.dstIp} proto=${record.protocol} ` +
    `spt=${record.srcPort} dpt=${record.dstPort} action=${record.action} ` +
    `bytes=${record.bytes} pkts=${record.packets} rule=${record.ruleId} ` +
    `in=${record.inInterface} out=${record.outInterface} uid=${record.uid}`;

  const line =
    `${formatSyslogTimestamp(record.timestamp)} ${record.host} ` +
    `${record.daemon}[${record.pid}]: ${message}`;
  // Reasons and host come from a swappable model, so the whole line is cleaned
  return stripControlChars(line).trimEnd();
}
