import * as fs from 'fs';
import { JSDOM, type DOMWindow } from 'jsdom';
import { GpxParseError, InvalidGpxDataError, NoTracksError, OpenError, describeCause } from './errors.js';
import type { RawTrackPoint } from './types.js';

export const GPX_NAMESPACE = 'http://www.topografix.com/GPX/1/0';
export const SUPPORTED_GPX_VERSION = '1.0';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';
const PARSER_ERROR_NAMESPACE = 'http://www.mozilla.org/newlayout/xml/parsererror.xml';

const DECLARATION_SCAN_BYTES = 256;
const XML_ENCODING_PATTERN = /^<\?xml\s[^>]*?\bencoding\s*=\s*["']([A-Za-z][\w.:-]*)["']/;

// Children of <trk> in GPX 1.0 schema order
const TRACK_CHILD_ORDER = ['name', 'cmt', 'desc', 'src', 'url', 'urlname', 'number', 'trkseg'];

export interface GpxDocumentOptions {
  /** Namespace the GPX elements are looked up in and created with */
  namespace: string;
}

const DEFAULT_OPTIONS: GpxDocumentOptions = {
  namespace: GPX_NAMESPACE,
};

function childElements(parent: Element, localName: string, namespace: string): Element[] {
  return Array.from(parent.children).filter(
    child => child.localName === localName && child.namespaceURI === namespace
  );
}

function firstChildElement(parent: Element, localName: string, namespace: string): Element | null {
  return childElements(parent, localName, namespace)[0] ?? null;
}

/**
 * Whitespace text directly before a node, used to indent inserted siblings
 * like their neighbours.
 */
function indentationBefore(node: Element | null): string | null {
  const prev = node?.previousSibling;
  if (!prev || prev.nodeType !== prev.TEXT_NODE) {
    return null;
  }
  const text = prev.textContent ?? '';
  return /^\s+$/.test(text) ? text : null;
}

/**
 * Handle on a single <trk> element. All reads and writes go through the
 * underlying DOM node so untouched content is serialized as it was parsed.
 */
export class GpxTrackHandle {
  constructor(
    readonly element: Element,
    private readonly namespace: string
  ) {}

  /** Text of <name>, or null when the track has none */
  name(): string | null {
    const el = firstChildElement(this.element, 'name', this.namespace);
    return el ? el.textContent ?? '' : null;
  }

  /** Text of <desc>, or null when the track has none */
  description(): string | null {
    const el = firstChildElement(this.element, 'desc', this.namespace);
    return el ? el.textContent ?? '' : null;
  }

  /**
   * All <trkpt> elements of all <trkseg> children, flattened in document order
   */
  points(): RawTrackPoint[] {
    const points: RawTrackPoint[] = [];
    for (const seg of childElements(this.element, 'trkseg', this.namespace)) {
      for (const pt of childElements(seg, 'trkpt', this.namespace)) {
        points.push({
          lat: pt.getAttribute('lat'),
          lon: pt.getAttribute('lon'),
          time: firstChildElement(pt, 'time', this.namespace)?.textContent ?? null,
        });
      }
    }
    return points;
  }

  getOrCreateDescription(): Element {
    return firstChildElement(this.element, 'desc', this.namespace) ?? this.insertChild('desc');
  }

  getOrCreateName(): Element {
    return firstChildElement(this.element, 'name', this.namespace) ?? this.insertChild('name');
  }

  /**
   * Create a GPX child element and insert it at its schema position,
   * reusing the parent's prefix and indentation.
   */
  private insertChild(localName: string): Element {
    const parent = this.element;
    const doc = parent.ownerDocument;
    const qualifiedName = parent.prefix ? `${parent.prefix}:${localName}` : localName;
    const created = doc.createElementNS(this.namespace, qualifiedName);

    const rankOf = (el: Element): number => {
      const rank = el.namespaceURI === this.namespace ? TRACK_CHILD_ORDER.indexOf(el.localName) : -1;
      return rank === -1 ? TRACK_CHILD_ORDER.length : rank;
    };
    const rank = TRACK_CHILD_ORDER.indexOf(localName);
    const following = Array.from(parent.children).find(child => rankOf(child) > rank) ?? null;

    if (following) {
      const indent = indentationBefore(following);
      parent.insertBefore(created, following);
      if (indent) {
        parent.insertBefore(doc.createTextNode(indent), following);
      }
      return created;
    }

    const last = parent.lastElementChild;
    if (last) {
      const indent = indentationBefore(last);
      const ref = last.nextSibling;
      if (indent) {
        parent.insertBefore(doc.createTextNode(indent), ref);
      }
      parent.insertBefore(created, ref);
      return created;
    }

    parent.appendChild(created);
    return created;
  }
}

export class GpxDocument {
  private constructor(
    private readonly window: DOMWindow,
    private readonly document: Document,
    private readonly root: Element,
    readonly options: GpxDocumentOptions
  ) {}

  /**
   * Parse XML text. Throws GpxParseError when the text is not well-formed.
   */
  static parse(xml: string, options: Partial<GpxDocumentOptions> = {}): GpxDocument {
    const { window } = new JSDOM('');
    const parser = new window.DOMParser();

    let doc: Document;
    try {
      doc = parser.parseFromString(xml.replace(/^\uFEFF/, ''), 'text/xml');
    } catch (error) {
      throw new GpxParseError(describeCause(error));
    }

    const root = doc.documentElement;
    if (!root) {
      throw new GpxParseError('document has no root element');
    }
    if (root.namespaceURI === PARSER_ERROR_NAMESPACE && root.localName === 'parsererror') {
      throw new GpxParseError((root.textContent ?? '').trim() || 'malformed XML');
    }

    return new GpxDocument(window, doc, root, { ...DEFAULT_OPTIONS, ...options });
  }

  /** Root tag in {namespace}localName form */
  rootTag(): string {
    const ns = this.root.namespaceURI;
    return ns ? `{${ns}}${this.root.localName}` : this.root.localName;
  }

  version(): string | null {
    return this.root.getAttribute('version');
  }

  creator(): string | null {
    return this.root.getAttribute('creator');
  }

  setCreator(value: string): void {
    this.root.setAttribute('creator', value);
  }

  /**
   * Check root element, version and presence of tracks.
   * @param source Name used in error messages, usually the file path
   */
  validate(source: string): void {
    const version = this.version();
    if (!version || this.rootTag() !== `{${this.options.namespace}}gpx`) {
      throw new InvalidGpxDataError(`File \`${source}' does not appear to be a valid GPX file!`);
    }
    if (version !== SUPPORTED_GPX_VERSION) {
      throw new InvalidGpxDataError(
        `File \`${source}' has unsupported GPX version ${version} (need: ${SUPPORTED_GPX_VERSION}).`
      );
    }
    if (this.findTracks().length === 0) {
      throw new NoTracksError(`No <trk> elements found in file \`${source}'!`);
    }
  }

  /** Direct <trk> children of the root, in document order */
  findTracks(): GpxTrackHandle[] {
    return childElements(this.root, 'trk', this.options.namespace).map(
      trk => new GpxTrackHandle(trk, this.options.namespace)
    );
  }

  /**
   * Serialize to UTF-8 XML text with an XML declaration
   */
  serialize(): string {
    const serializer = new this.window.XMLSerializer();
    // Top-level comments and processing instructions go on their own lines
    const nodes = Array.from(this.document.childNodes, node => serializer.serializeToString(node));
    return `${XML_DECLARATION}\n${nodes.join('\n')}\n`;
  }
}

/**
 * Decode raw file bytes. A byte order mark wins over the encoding named in
 * the XML declaration; without either the bytes are read as UTF-8.
 */
export function decodeGpxBytes(bytes: Uint8Array): string {
  const encoding = sniffEncoding(bytes);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    throw new GpxParseError(`unsupported encoding \`${encoding}'`, { cause: error });
  }
  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new GpxParseError(`invalid ${decoder.encoding} byte sequence`, { cause: error });
  }
}

function sniffEncoding(bytes: Uint8Array): string {
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) {
    return 'utf-8';
  }
  if (bytes[0] === 0xff && bytes[1] === 0xfe) {
    return 'utf-16le';
  }
  if (bytes[0] === 0xfe && bytes[1] === 0xff) {
    return 'utf-16be';
  }
  const head = new TextDecoder('latin1').decode(bytes.subarray(0, DECLARATION_SCAN_BYTES));
  return XML_ENCODING_PATTERN.exec(head)?.[1] ?? 'utf-8';
}

export function loadGpxDocument(
  input: string | Uint8Array,
  options: Partial<GpxDocumentOptions> = {}
): GpxDocument {
  const xml = typeof input === 'string' ? input : decodeGpxBytes(input);
  return GpxDocument.parse(xml, options);
}

/**
 * Read the raw bytes of a GPX file. Throws OpenError when it cannot be read.
 */
export function readGpxFile(filePath: string): Uint8Array {
  try {
    return fs.readFileSync(filePath);
  } catch (error) {
    throw new OpenError(`Could not open file \`${filePath}': ${describeCause(error)}`, { cause: error });
  }
}
