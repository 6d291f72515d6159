import { randomInt } from 'crypto';
import { isIPv4 } from 'net';

// https://datatracker.ietf.org/doc/html/rfc1035#section-4.1
export const DNS_HEADER_LENGTH = 12;
export const DNS_TYPE_A = 1;
export const DNS_CLASS_IN = 1;
/** TTL put on every answer we synthesise; the cache does not track upstream TTLs */
export const DEFAULT_ANSWER_TTL = 3600;

export const OPCODE_QUERY = 0;

export const RCODE_NOERROR = 0;
export const RCODE_FORMERR = 1;
export const RCODE_SERVFAIL = 2;

const FLAG_QR = 0x8000;
const FLAG_RD = 0x0100;
const FLAG_RA = 0x0080;
const FLAG_CD = 0x0010;

const MAX_POINTER_JUMPS = 64;

export interface DNSHeader {
  id: number;
  qr: boolean;
  opcode: number;
  rd: boolean;
  cd: boolean;
  rcode: number;
  qdcount: number;
  ancount: number;
  nscount: number;
  arcount: number;
}

export interface DNSQuestion {
  /** Fully-qualified, with trailing dot */
  name: string;
  type: number;
  class: number;
}

export interface DNSResourceRecord {
  name: string;
  type: number;
  class: number;
  ttl: number;
  data: Buffer;
}

export interface DNSMessage {
  header: DNSHeader;
  questions: DNSQuestion[];
  answers: DNSResourceRecord[];
}

export interface AnswerRecord {
  name: string;
  address: string;
}

export class MalformedMessageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedMessageError';
  }
}

/**
 * Normalise a domain name to its fully-qualified form (trailing dot)
 */
export function toFqdn(domain: string): string {
  return domain.endsWith('.') ? domain : `${domain}.`;
}

export function parseHeader(msg: Buffer): DNSHeader {
  if (msg.length < DNS_HEADER_LENGTH) {
    throw new MalformedMessageError(`Message too short: ${msg.length} bytes`);
  }

  const flags = msg.readUInt16BE(2);
  return {
    id: msg.readUInt16BE(0),
    qr: (flags & FLAG_QR) !== 0,
    opcode: (flags >> 11) & 0xf,
    rd: (flags & FLAG_RD) !== 0,
    cd: (flags & FLAG_CD) !== 0,
    rcode: flags & 0xf,
    qdcount: msg.readUInt16BE(4),
    ancount: msg.readUInt16BE(6),
    nscount: msg.readUInt16BE(8),
    arcount: msg.readUInt16BE(10),
  };
}

/**
 * Read a (possibly compressed) domain name starting at `offset`.
 * Returns the name and the offset just past it in the original position.
 */
export function readName(msg: Buffer, offset: number): { name: string; offset: number } {
  const labels: string[] = [];
  let position = offset;
  let nextOffset: number | null = null;
  let jumps = 0;

  while (true) {
    if (position >= msg.length) {
      throw new MalformedMessageError('Name extends beyond message');
    }

    const length = msg[position];

    if (length === 0) {
      position++;
      break;
    }

    if ((length & 0xc0) === 0xc0) {
      if (position + 2 > msg.length) {
        throw new MalformedMessageError('Truncated compression pointer');
      }
      if (++jumps > MAX_POINTER_JUMPS) {
        throw new MalformedMessageError('Compression pointer loop');
      }
      if (nextOffset === null) {
        nextOffset = position + 2;
      }
      position = msg.readUInt16BE(position) & 0x3fff;
      continue;
    }

    if ((length & 0xc0) !== 0) {
      throw new MalformedMessageError(`Unsupported label type 0x${length.toString(16)}`);
    }

    if (position + 1 + length > msg.length) {
      throw new MalformedMessageError('Label extends beyond message');
    }

    // latin1 maps each byte to one char, so names re-encode byte for byte
    labels.push(msg.toString('latin1', position + 1, position + 1 + length));
    position += length + 1;

    if (labels.join('.').length > 255) {
      throw new MalformedMessageError('Name longer than 255 characters');
    }
  }

  return {
    name: labels.length === 0 ? '.' : `${labels.join('.')}.`,
    offset: nextOffset ?? position,
  };
}

/**
 * Decode header, question section and answer section. Authority and
 * additional sections are not needed and are left unread.
 */
export function parseDNSMessage(msg: Buffer): DNSMessage {
  const header = parseHeader(msg);
  let offset = DNS_HEADER_LENGTH;

  const questions: DNSQuestion[] = [];
  for (let i = 0; i < header.qdcount; i++) {
    const { name, offset: next } = readName(msg, offset);
    if (next + 4 > msg.length) {
      throw new MalformedMessageError('Question extends beyond message');
    }
    questions.push({
      name,
      type: msg.readUInt16BE(next),
      class: msg.readUInt16BE(next + 2),
    });
    offset = next + 4;
  }

  const answers: DNSResourceRecord[] = [];
  for (let i = 0; i < header.ancount; i++) {
    const { name, offset: next } = readName(msg, offset);
    if (next + 10 > msg.length) {
      throw new MalformedMessageError('Resource record header extends beyond message');
    }
    const rdlength = msg.readUInt16BE(next + 8);
    const dataStart = next + 10;
    if (dataStart + rdlength > msg.length) {
      throw new MalformedMessageError('Resource record data extends beyond message');
    }
    answers.push({
      name,
      type: msg.readUInt16BE(next),
      class: msg.readUInt16BE(next + 2),
      ttl: msg.readUInt32BE(next + 4),
      data: msg.subarray(dataStart, dataStart + rdlength),
    });
    offset = dataStart + rdlength;
  }

  return { header, questions, answers };
}

/**
 * IPv4 addresses of the A records in an answer section, in message order
 */
export function extractARecords(message: DNSMessage): string[] {
  const addresses: string[] = [];
  for (const answer of message.answers) {
    if (answer.type === DNS_TYPE_A && answer.class === DNS_CLASS_IN && answer.data.length === 4) {
      addresses.push(Array.from(answer.data).join('.'));
    }
  }
  return addresses;
}

export function domainToBytes(domain: string): Buffer {
  const buffers: Buffer[] = [];
  for (const part of toFqdn(domain).split('.')) {
    if (part === '') continue;
    if (/[^\x00-\xff]/.test(part)) {
      throw new MalformedMessageError(`Label is not a single-byte string: ${part}`);
    }
    const label = Buffer.from(part, 'latin1');
    if (label.length > 63) {
      throw new MalformedMessageError(`Label longer than 63 bytes: ${part}`);
    }
    buffers.push(Buffer.from([label.length]));
    buffers.push(label);
  }
  buffers.push(Buffer.from([0])); // Null terminator
  return Buffer.concat(buffers);
}

export function ipv4ToBytes(ip: string): Buffer {
  return Buffer.from(ip.split('.').map(Number));
}

/**
 * Recursive query for a single question
 */
export function createDNSQuery(domain: string, type: number = DNS_TYPE_A, id: number = randomInt(0, 0x10000)): Buffer {
  const header = Buffer.alloc(DNS_HEADER_LENGTH);
  header.writeUInt16BE(id, 0);
  header.writeUInt16BE(FLAG_RD, 2);
  header.writeUInt16BE(1, 4); // QDCOUNT

  const question = Buffer.alloc(4);
  question.writeUInt16BE(type, 0);
  question.writeUInt16BE(DNS_CLASS_IN, 2);

  return Buffer.concat([header, domainToBytes(domain), question]);
}

function encodeQuestion(question: DNSQuestion): Buffer {
  const tail = Buffer.alloc(4);
  tail.writeUInt16BE(question.type, 0);
  tail.writeUInt16BE(question.class, 2);
  return Buffer.concat([domainToBytes(question.name), tail]);
}

function encodeAnswer(answer: AnswerRecord): Buffer {
  const fixed = Buffer.alloc(10);
  fixed.writeUInt16BE(DNS_TYPE_A, 0);
  fixed.writeUInt16BE(DNS_CLASS_IN, 2);
  fixed.writeUInt32BE(DEFAULT_ANSWER_TTL, 4);
  fixed.writeUInt16BE(4, 8);
  return Buffer.concat([domainToBytes(answer.name), fixed, ipv4ToBytes(answer.address)]);
}

/**
 * Build a reply to `query`: same id, opcode and RD/CD bits, the original
 * questions echoed, names written uncompressed. Answers whose address is not
 * a valid IPv4 literal are left out.
 */
export function createDNSReply(
  query: DNSHeader,
  questions: readonly DNSQuestion[],
  answers: readonly AnswerRecord[] = [],
  rcode: number = RCODE_NOERROR,
): Buffer {
  const valid = answers.filter((answer) => isIPv4(answer.address));

  let flags = FLAG_QR | FLAG_RA | ((query.opcode & 0xf) << 11) | (rcode & 0xf);
  if (query.rd) flags |= FLAG_RD;
  if (query.cd) flags |= FLAG_CD;

  const header = Buffer.alloc(DNS_HEADER_LENGTH);
  header.writeUInt16BE(query.id, 0);
  header.writeUInt16BE(flags, 2);
  header.writeUInt16BE(questions.length, 4);
  header.writeUInt16BE(valid.length, 6);

  return Buffer.concat([header, ...questions.map(encodeQuestion), ...valid.map(encodeAnswer)]);
}
