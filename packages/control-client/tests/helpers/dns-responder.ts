/**
 * @file dns-responder.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { createSocket, type RemoteInfo } from "dgram";

export type DnsRecordType = "A" | "AAAA";

export const DNS_RCODE = {
  SERVFAIL: 2,
  NXDOMAIN: 3,
} as const;

export interface DnsZone {
  A?: string[];
  AAAA?: string[];
  /** Answers every question with this response code and no records */
  rcode?: number;
  /** Records questions without answering */
  silent?: boolean;
}

export interface DnsResponder {
  /** host:port for Resolver.setServers */
  address: string;
  /** Record types asked, in arrival order */
  received: DnsRecordType[];
  /** Resolves once the first question has arrived */
  queried: Promise<void>;
  stop(): Promise<void>;
}

const RECORD_TYPES = new Map<number, DnsRecordType>([
  [1, "A"],
  [28, "AAAA"],
]);

function encodeAddress(type: DnsRecordType, address: string): Buffer {
  if (type === "A") {
    return Buffer.from(address.split(".").map(Number));
  }
  const [head = "", tail] = address.split("::");
  const headGroups = head ? head.split(":") : [];
  const tailGroups = tail ? tail.split(":") : [];
  const groups = [...headGroups, ...Array<string>(8 - headGroups.length - tailGroups.length).fill("0"), ...tailGroups];
  const data = Buffer.alloc(16);
  groups.forEach((group, index) => data.writeUInt16BE(parseInt(group, 16), index * 2));
  return data;
}

function answer(query: Buffer, zone: DnsZone): { type: DnsRecordType | undefined; response: Buffer } {
  let offset = 12;
  while (query.readUInt8(offset) !== 0) {
    offset += query.readUInt8(offset) + 1;
  }
  offset += 1;
  const qtype = query.readUInt16BE(offset);
  const questionEnd = offset + 4;
  const type = RECORD_TYPES.get(qtype);

  const addresses = zone.rcode === undefined && type ? zone[type] ?? [] : [];
  const records = addresses.map((address) => {
    const rdata = encodeAddress(type ?? "A", address);
    const record = Buffer.alloc(12);
    record.writeUInt16BE(0xc00c, 0);
    record.writeUInt16BE(qtype, 2);
    record.writeUInt16BE(1, 4);
    record.writeUInt32BE(60, 6);
    record.writeUInt16BE(rdata.length, 10);
    return Buffer.concat([record, rdata]);
  });

  const header = Buffer.alloc(12);
  header.writeUInt16BE(query.readUInt16BE(0), 0);
  header.writeUInt16BE(0x8000 | (query.readUInt16BE(2) & 0x0100) | 0x0080 | (zone.rcode ?? 0), 2);
  header.writeUInt16BE(1, 4);
  header.writeUInt16BE(records.length, 6);

  return { type, response: Buffer.concat([header, query.subarray(12, questionEnd), ...records]) };
}

/**
 * Starts a UDP DNS server on 127.0.0.1 answering from a fixed zone.
 */
export async function startDnsResponder(zone: DnsZone): Promise<DnsResponder> {
  const socket = createSocket("udp4");
  const received: DnsRecordType[] = [];
  let onQuery: () => void = () => undefined;
  const queried = new Promise<void>((resolve) => {
    onQuery = resolve;
  });

  socket.on("message", (message: Buffer, remote: RemoteInfo) => {
    const { type, response } = answer(message, zone);
    if (type) {
      received.push(type);
    }
    onQuery();
    if (!zone.silent) {
      socket.send(response, remote.port, remote.address);
    }
  });

  await new Promise<void>((resolve) => socket.bind(0, "127.0.0.1", resolve));

  return {
    address: `127.0.0.1:${socket.address().port}`,
    received,
    queried,
    stop: () => new Promise<void>((resolve) => socket.close(() => resolve())),
  };
}
