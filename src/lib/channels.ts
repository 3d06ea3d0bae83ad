import { ELEMENT_SYMBOL_PATTERN } from './constants';
import { HeaderCollisionError } from './errors';
import type { ChannelDescriptor } from './types';

type Token = { kind: 'word'; text: string } | { kind: 'arrow' | 'open' | 'close' };

const MASS_PATTERN = /^\d+$/;

/**
 * Split a header into words and the "->", "[" and "]" delimiters.
 */
export function tokenizeHeader(header: string): Token[] {
  const tokens: Token[] = [];
  const pattern = /->|\[|\]|[^\s[\]]+?(?=->|\[|\]|\s|$)/g;
  for (const match of header.matchAll(pattern)) {
    const text = match[0];
    if (text === '->') tokens.push({ kind: 'arrow' });
    else if (text === '[') tokens.push({ kind: 'open' });
    else if (text === ']') tokens.push({ kind: 'close' });
    else tokens.push({ kind: 'word', text });
  }
  return tokens;
}

function readMass(token: Token | undefined): number | null {
  if (!token || token.kind !== 'word' || !MASS_PATTERN.test(token.text)) return null;
  const mass = parseInt(token.text, 10);
  return mass > 0 ? mass : null;
}

/**
 * Parse one instrument header.
 * Handles:
 * - "63  Cu  [ He ]" -> Cu63_He
 * - "75 -> 91  As  [ O2 ]" -> As75to91_O2
 * Returns null when the header matches neither form.
 */
export function parseChannelHeader(header: string): ChannelDescriptor | null {
  const tokens = tokenizeHeader(header);
  let i = 0;

  const nominalMass = readMass(tokens[i++]);
  if (nominalMass === null) return null;

  let analyzedMass = nominalMass;
  let isMassShift = false;
  if (tokens[i]?.kind === 'arrow') {
    const shifted = readMass(tokens[i + 1]);
    if (shifted === null) return null;
    analyzedMass = shifted;
    isMassShift = true;
    i += 2;
  }

  const elementToken = tokens[i++];
  if (!elementToken || elementToken.kind !== 'word' || !ELEMENT_SYMBOL_PATTERN.test(elementToken.text)) {
    return null;
  }
  const element = elementToken.text;

  if (tokens[i++]?.kind !== 'open') return null;
  const gasWords: string[] = [];
  while (i < tokens.length) {
    const token = tokens[i];
    if (token.kind !== 'word') break;
    gasWords.push(token.text);
    i++;
  }
  if (tokens[i++]?.kind !== 'close' || i !== tokens.length || gasWords.length === 0) {
    return null;
  }
  const gasMode = gasWords.join(' ');

  const channelId = isMassShift
    ? `${element}${nominalMass}to${analyzedMass}_${gasMode}`
    : `${element}${nominalMass}_${gasMode}`;

  return {
    originalHeader: header,
    channelId,
    element,
    nominalMass,
    analyzedMass,
    gasMode,
    isMassShift,
  };
}

export interface ChannelParseResult {
  channels: ChannelDescriptor[];
  skipped: string[];
}

/**
 * Parse every non-metadata header. Empty headers are ignored, unparsable ones
 * are returned in `skipped`; two headers resolving to one channel id throw.
 */
export function parseChannelHeaders(headers: readonly string[]): ChannelParseResult {
  const channels: ChannelDescriptor[] = [];
  const skipped: string[] = [];
  const seen = new Map<string, string>();

  for (const header of headers) {
    if (!header.trim()) continue;

    const channel = parseChannelHeader(header);
    if (!channel) {
      skipped.push(header);
      continue;
    }

    const previous = seen.get(channel.channelId);
    if (previous !== undefined) {
      throw new HeaderCollisionError(channel.channelId, [previous, header]);
    }
    seen.set(channel.channelId, header);
    channels.push(channel);
  }

  return { channels, skipped };
}
