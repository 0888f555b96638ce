import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import { applyTransform } from './transforms.js';
import type { LogBuffer } from './log-buffer.js';
import type { DocumentModel, Fact, FactKind } from './types.js';

function splitQName(qname: string): { prefix?: string; localName: string } {
  const idx = qname.indexOf(':');
  if (idx < 0) return { localName: qname };
  return { prefix: qname.slice(0, idx), localName: qname.slice(idx + 1) };
}

function localNameOf(tagName: string): string {
  return splitQName(tagName).localName;
}

function hasPrefix(tagName: string): boolean {
  return tagName.includes(':');
}

function factKindOf(tagName: string): FactKind | undefined {
  if (!hasPrefix(tagName)) return undefined;
  switch (localNameOf(tagName)) {
    case 'nonNumeric':
      return 'nonNumeric';
    case 'nonFraction':
      return 'nonFraction';
    default:
      return undefined;
  }
}

/**
 * Parses an inline XBRL document into a {@link DocumentModel}.
 * Returns `undefined` (after logging why) when the document carries no
 * inline XBRL header.
 */
export function parseInlineDocument(
  source: string,
  entrypoint: string,
  sourceFile: string,
  logs: LogBuffer
): DocumentModel | undefined {
  const $ = cheerio.load(source, { xml: true });
  const all = $<Element, string>('*');

  const hasHeader = all.toArray().some((el) => hasPrefix(el.tagName) && localNameOf(el.tagName) === 'header');
  if (!hasHeader) {
    logs.error('ix:missingHeader', 'Document does not contain an inline XBRL header', sourceFile);
    return undefined;
  }

  const usedIds = new Set<string>();
  all.each((_, el) => {
    const id = $(el).attr('id');
    if (id) usedIds.add(id);
  });
  let generated = 0;
  const nextId = (): string => {
    let id: string;
    do {
      generated += 1;
      id = `f${generated}`;
    } while (usedIds.has(id));
    usedIds.add(id);
    return id;
  };

  const facts: Fact[] = [];
  all.each((_, el) => {
    const kind = factKindOf(el.tagName);
    if (!kind) return;

    const node = $(el);
    const qname = node.attr('name');
    if (!qname) {
      logs.warning('ix:missingName', `Fact element ${el.tagName} has no name attribute`, sourceFile);
      return;
    }

    const copy = node.clone();
    copy
      .find('*')
      .filter((__, child) => hasPrefix(child.tagName) && localNameOf(child.tagName) === 'exclude')
      .remove();
    const rawValue = copy.text().replace(/\s+/g, ' ').trim();

    const format = node.attr('format');
    let value = rawValue;
    if (format) {
      const outcome = applyTransform(format, rawValue);
      if (outcome.ok) {
        value = outcome.value;
      } else if (outcome.reason === 'unsupported') {
        logs.warning('ixt:unsupportedFormat', `Unsupported format ${format} on ${qname}`, sourceFile);
      } else {
        logs.warning('ixt:invalidValue', `Value "${rawValue}" of ${qname} does not match format ${format}`, sourceFile);
      }
    }
    if (kind === 'nonFraction' && node.attr('sign') === '-' && value !== '0') {
      value = `-${value}`;
    }

    const { prefix, localName } = splitQName(qname);
    facts.push({
      id: node.attr('id') ?? nextId(),
      kind,
      qname,
      prefix,
      localName,
      value,
      rawValue,
      contextRef: node.attr('contextRef'),
      unitRef: node.attr('unitRef'),
      format,
    });
  });

  const factsByLocalName = new Map<string, Fact[]>();
  for (const fact of facts) {
    const group = factsByLocalName.get(fact.localName);
    if (group) {
      group.push(fact);
    } else {
      factsByLocalName.set(fact.localName, [fact]);
    }
  }

  logs.info('ix:loaded', `Loaded ${facts.length} facts`, sourceFile);
  return { entrypoint, sourceFile, facts, factsByLocalName };
}
