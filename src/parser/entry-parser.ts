// src/parser/entry-parser.ts

import { EntryKind, MAX_FRAME_ID } from '../constants/constants.js';
import type {
  BusConfigurationEntry,
  Entry,
  EntryTokenizer,
  FrameAttributeEntry,
  FrameDefinitionEntry,
  FrameDescriptionEntry,
  SignalAttributeEntry,
  SignalDefinitionEntry,
  SignalDescriptionEntry,
  SignalValueTableEntry,
  VersionEntry,
} from '../types/dbc-types.js';

const NUM = String.raw`[-+]?\d+(?:\.\d*)?(?:[eE][-+]?\d+)?`;

const RE_VERSION = /^VERSION\s+"(?<version>[^"]*)"/;
const RE_BUS_CONFIGURATION = new RegExp(String.raw`^BS_\s*:\s*(?<speed>${NUM})`);
const RE_FRAME_DEFINITION =
  /^BO_\s+(?<id>\d+)\s+(?<name>[^\s:]+)\s*:\s*(?<len>\d+)\s+(?<sender>.*)$/;
const RE_FRAME_DESCRIPTION = /^CM_\s+BO_\s+(?<id>\d+)\s+"(?<text>.*)"\s*;/;
const RE_FRAME_ATTRIBUTE = /^BA_\s+"(?<key>\w+)"\s+BO_\s+(?<id>\d+)\s+"?(?<value>[^";]*?)"?\s*;/;
const RE_SIGNAL_DEFINITION = new RegExp(
  String.raw`^\s*SG_\s+(?<name>[^\s:]+)\s*(?:(?<mux>m\d+|M)\s*)?:\s*` +
    String.raw`(?<start>\d+)\|(?<len>\d+)@(?<endian>[01])(?<sign>[+-])\s*` +
    String.raw`\(\s*(?<scale>${NUM})\s*,\s*(?<offset>${NUM})\s*\)\s*` +
    String.raw`\[\s*(?<min>${NUM})\s*\|\s*(?<max>${NUM})\s*\]\s*` +
    String.raw`"(?<unit>[^"]*)"\s*(?<receivers>.*)$`
);
const RE_SIGNAL_DESCRIPTION = /^CM_\s+SG_\s+(?<id>\d+)\s+(?<name>\w+)\s+"(?<text>.*)"\s*;/;
const RE_SIGNAL_ATTRIBUTE =
  /^BA_\s+"(?<key>\w+)"\s+SG_\s+(?<id>\d+)\s+(?<name>\w+)\s+"?(?<value>[^";]*?)"?\s*;/;
const RE_VALUE_TABLE = /^VAL_\s+(?<id>\d+)\s+(?<name>\w+)\s+(?<body>.*);/;
const RE_VALUE_PAIR = /(-?\d+)\s+"([^"]*)"/g;

/**
 * Парсит ID кадра; значения вне uint32 отбрасываются
 */
function parseFrameId(text: string | undefined): number | null {
  if (text === undefined) return null;
  const id = Number(text);
  return Number.isSafeInteger(id) && id <= MAX_FRAME_ID ? id : null;
}

function group(match: RegExpMatchArray, name: string): string {
  return match.groups?.[name] ?? '';
}

export function parseVersion(line: string): VersionEntry | null {
  const m = line.match(RE_VERSION);
  return m ? { kind: EntryKind.VERSION, version: group(m, 'version') } : null;
}

export function parseBusConfiguration(line: string): BusConfigurationEntry | null {
  const m = line.match(RE_BUS_CONFIGURATION);
  return m ? { kind: EntryKind.BUS_CONFIGURATION, speed: Number(group(m, 'speed')) } : null;
}

export function parseFrameDefinition(line: string): FrameDefinitionEntry | null {
  const m = line.match(RE_FRAME_DEFINITION);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  return {
    kind: EntryKind.FRAME_DEFINITION,
    id,
    name: group(m, 'name'),
    length: Number(group(m, 'len')),
    sender: group(m, 'sender').trim(),
  };
}

export function parseFrameDescription(line: string): FrameDescriptionEntry | null {
  const m = line.match(RE_FRAME_DESCRIPTION);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  return { kind: EntryKind.FRAME_DESCRIPTION, id, text: group(m, 'text') };
}

export function parseFrameAttribute(line: string): FrameAttributeEntry | null {
  const m = line.match(RE_FRAME_ATTRIBUTE);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  return {
    kind: EntryKind.FRAME_ATTRIBUTE,
    id,
    key: group(m, 'key'),
    value: group(m, 'value'),
  };
}

export function parseSignalDefinition(line: string): SignalDefinitionEntry | null {
  const m = line.match(RE_SIGNAL_DEFINITION);
  if (!m) return null;
  const entry: SignalDefinitionEntry = {
    kind: EntryKind.SIGNAL_DEFINITION,
    name: group(m, 'name'),
    startBit: Number(group(m, 'start')),
    bitLength: Number(group(m, 'len')),
    littleEndian: group(m, 'endian') === '1',
    signed: group(m, 'sign') === '-',
    scale: Number(group(m, 'scale')),
    offset: Number(group(m, 'offset')),
    min: Number(group(m, 'min')),
    max: Number(group(m, 'max')),
    unit: group(m, 'unit'),
    receivers: group(m, 'receivers').trim(),
  };
  const mux = m.groups?.['mux'];
  if (mux) entry.multiplexer = mux;
  return entry;
}

export function parseSignalDescription(line: string): SignalDescriptionEntry | null {
  const m = line.match(RE_SIGNAL_DESCRIPTION);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  return {
    kind: EntryKind.SIGNAL_DESCRIPTION,
    id,
    signalName: group(m, 'name'),
    text: group(m, 'text'),
  };
}

export function parseSignalAttribute(line: string): SignalAttributeEntry | null {
  const m = line.match(RE_SIGNAL_ATTRIBUTE);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  return {
    kind: EntryKind.SIGNAL_ATTRIBUTE,
    id,
    signalName: group(m, 'name'),
    key: group(m, 'key'),
    value: group(m, 'value'),
  };
}

export function parseSignalValueTable(line: string): SignalValueTableEntry | null {
  const m = line.match(RE_VALUE_TABLE);
  if (!m) return null;
  const id = parseFrameId(m.groups?.['id']);
  if (id === null) return null;
  const values = new Map<number, string>();
  for (const pair of group(m, 'body').matchAll(RE_VALUE_PAIR)) {
    values.set(Number(pair[1]), pair[2] ?? '');
  }
  return { kind: EntryKind.SIGNAL_VALUE_TABLE, id, signalName: group(m, 'name'), values };
}

const PARSERS: Array<(line: string) => Entry | null> = [
  parseFrameDefinition,
  parseFrameDescription,
  parseFrameAttribute,
  parseSignalDefinition,
  parseSignalDescription,
  parseSignalAttribute,
  parseSignalValueTable,
  parseVersion,
  parseBusConfiguration,
];

/**
 * Turns one line of DBC source into an entry.
 * @param line - a single line, without its terminator
 * @returns the entry, or null when no grammar rule matches
 */
export const parseEntry: EntryTokenizer = (line: string): Entry | null => {
  for (const parse of PARSERS) {
    const entry = parse(line);
    if (entry) return entry;
  }
  return null;
};
