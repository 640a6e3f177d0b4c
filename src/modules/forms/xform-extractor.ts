import { XMLParser, XMLValidator } from 'fast-xml-parser';

import { QuestionCollector } from './collector';
import { DEFAULT_LANGUAGE, UNKNOWN_TYPE, type QuestionRecord } from './types';

export type XmlElement = {
  tag: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
};

type Bind = {
  type: string | null;
  readonly: boolean;
  calculate: boolean;
  preload: boolean;
};

export class XFormParseError extends Error {}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
});

const CONTAINERS = new Set(['group', 'repeat']);

const BIND_TYPES: Record<string, string> = {
  string: 'text',
  int: 'integer',
  integer: 'integer',
  decimal: 'decimal',
  date: 'date',
  time: 'time',
  dateTime: 'datetime',
  geopoint: 'geopoint',
  geotrace: 'geotrace',
  geoshape: 'geoshape',
  barcode: 'barcode',
  binary: 'file',
};

const ITEXT_REF = /jr:itext\(\s*['"]([^'"]+)['"]\s*\)/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (isRecord(raw)) {
    for (const [key, value] of Object.entries(raw)) {
      attributes[key] = String(value);
    }
  }
  return attributes;
}

function toElements(raw: unknown): XmlElement[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const elements: XmlElement[] = [];
  for (const entry of raw) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ':@') {
        continue;
      }
      if (key === '#text') {
        elements.push({ tag: '#text', attributes: {}, children: [], text: String(value) });
        continue;
      }
      elements.push({ tag: key, attributes: toAttributes(entry[':@']), children: toElements(value), text: '' });
    }
  }
  return elements;
}

export function parseXml(xml: string): XmlElement[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XFormParseError(`Malformed XML at line ${validation.err.line}: ${validation.err.msg}`);
  }
  return toElements(parser.parse(xml));
}

export function textOf(element: XmlElement): string {
  return element.children
    .filter((child) => child.tag === '#text')
    .map((child) => child.text)
    .join('')
    .trim();
}

function findFirst(elements: XmlElement[], tag: string): XmlElement | null {
  for (const element of elements) {
    if (element.tag === tag) {
      return element;
    }
    const nested = findFirst(element.children, tag);
    if (nested) {
      return nested;
    }
  }
  return null;
}

function childrenNamed(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter((child) => child.tag === tag);
}

function lastSegment(ref: string): string {
  const segments = ref.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? '';
}

function readTranslations(model: XmlElement | null): Map<string, Record<string, string>> {
  const table = new Map<string, Record<string, string>>();
  const itext = model ? childrenNamed(model, 'itext')[0] : undefined;
  if (!itext) {
    return table;
  }

  for (const translation of childrenNamed(itext, 'translation')) {
    const language = translation.attributes.lang || DEFAULT_LANGUAGE;
    for (const text of childrenNamed(translation, 'text')) {
      const id = text.attributes.id;
      if (!id) {
        continue;
      }
      const values = childrenNamed(text, 'value');
      const plain = values.find((value) => !value.attributes.form) ?? values[0];
      const content = plain ? textOf(plain) : '';
      if (!content) {
        continue;
      }
      const labels = table.get(id) ?? {};
      labels[language] = content;
      table.set(id, labels);
    }
  }

  return table;
}

function readBinds(model: XmlElement | null): Map<string, Bind> {
  const binds = new Map<string, Bind>();
  if (!model) {
    return binds;
  }

  for (const bind of childrenNamed(model, 'bind')) {
    const nodeset = bind.attributes.nodeset;
    if (!nodeset) {
      continue;
    }
    binds.set(nodeset, {
      type: bind.attributes.type ? bind.attributes.type.replace(/^[A-Za-z]+:/, '') : null,
      readonly: bind.attributes.readonly === 'true()',
      calculate: Boolean(bind.attributes.calculate),
      preload: Boolean(bind.attributes.preload),
    });
  }

  return binds;
}

function controlType(element: XmlElement, bind: Bind | undefined): string {
  switch (element.tag) {
    case 'input':
      return bind?.type ? BIND_TYPES[bind.type] ?? bind.type : 'text';
    case 'select1':
      return 'select_one';
    case 'select':
      return 'select_multiple';
    case 'upload': {
      const mediatype = element.attributes.mediatype ?? '';
      if (mediatype.startsWith('image/')) return 'image';
      if (mediatype.startsWith('audio/')) return 'audio';
      if (mediatype.startsWith('video/')) return 'video';
      return 'file';
    }
    case 'range':
      return 'range';
    case 'trigger':
      return 'acknowledge';
    case 'rank':
      return 'rank';
    default:
      return UNKNOWN_TYPE;
  }
}

const CONTROLS = new Set(['input', 'select1', 'select', 'upload', 'range', 'trigger', 'rank']);

function controlLabels(element: XmlElement, translations: Map<string, Record<string, string>>): Record<string, string> {
  const label = childrenNamed(element, 'label')[0];
  if (!label) {
    return {};
  }

  const reference = label.attributes.ref ? ITEXT_REF.exec(label.attributes.ref) : null;
  if (reference) {
    return { ...(translations.get(reference[1]) ?? {}) };
  }

  const text = textOf(label);
  return text ? { [DEFAULT_LANGUAGE]: text } : {};
}

function walkBody(
  elements: XmlElement[],
  binds: Map<string, Bind>,
  translations: Map<string, Record<string, string>>,
  collector: QuestionCollector,
  seenRefs: Set<string>,
): void {
  for (const element of elements) {
    if (CONTAINERS.has(element.tag)) {
      walkBody(element.children, binds, translations, collector, seenRefs);
      continue;
    }
    if (!CONTROLS.has(element.tag)) {
      continue;
    }

    const ref = element.attributes.ref ?? element.attributes.nodeset;
    if (!ref) {
      continue;
    }
    seenRefs.add(ref);

    const bind = binds.get(ref);
    if (element.tag === 'input' && bind?.readonly && !bind.calculate) {
      continue;
    }

    collector.add(lastSegment(ref), controlLabels(element, translations), controlType(element, bind));
  }
}

/**
 * Extracts questions from an XForm document: body controls in document order, then
 * calculated fields, which have a bind but no control. Metadata binds are ignored.
 */
export function extractXFormQuestions(xml: string): QuestionRecord[] {
  const root = findFirst(parseXml(xml), 'html');
  if (!root) {
    throw new XFormParseError('XForm has no html root element');
  }
  const body = childrenNamed(root, 'body')[0];
  if (!body) {
    throw new XFormParseError('XForm has no body element');
  }

  const head = childrenNamed(root, 'head')[0];
  const model = head ? childrenNamed(head, 'model')[0] ?? null : null;
  const binds = readBinds(model);
  const translations = readTranslations(model);
  const collector = new QuestionCollector();
  const seenRefs = new Set<string>();

  walkBody(body.children, binds, translations, collector, seenRefs);

  for (const [nodeset, bind] of binds) {
    if (!bind.calculate || bind.preload || seenRefs.has(nodeset) || nodeset.includes('/meta/')) {
      continue;
    }
    collector.add(lastSegment(nodeset), {}, 'calculate');
  }

  return collector.toArray();
}
