/**
 * Typed XML element tree on top of fast-xml-parser.
 *
 * Element names keep their namespace prefix (`cmd:resourceName`); lookups go by
 * local name so both source dialects can be queried with the same paths.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const PARSER_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // Numeric character references (&#228;, &#xE4;) are decoded only with this on
  htmlEntities: true,
} as const;

const parser = new XMLParser(PARSER_OPTIONS);
const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  suppressEmptyNode: true,
});

// ============================================================================
// Types
// ============================================================================

export type XmlChild = XmlElement | string;

/** Ordered node shape used by fast-xml-parser with `preserveOrder` */
type OrderedNode = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Strip a namespace prefix: `cmd:resourceName` -> `resourceName`
 */
export function localName(qualifiedName: string): string {
  const separator = qualifiedName.indexOf(":");
  return separator === -1 ? qualifiedName : qualifiedName.slice(separator + 1);
}

// ============================================================================
// Element
// ============================================================================

export class XmlElement {
  readonly localName: string;

  constructor(
    readonly name: string,
    readonly attributes: ReadonlyMap<string, string>,
    readonly children: readonly XmlChild[]
  ) {
    this.localName = localName(name);
  }

  /** Child elements in document order */
  get elements(): XmlElement[] {
    return this.children.filter(
      (child): child is XmlElement => child instanceof XmlElement
    );
  }

  /** Concatenated text of the direct text children */
  get text(): string {
    return this.children
      .filter((child): child is string => typeof child === "string")
      .join("");
  }

  /**
   * Attribute value by qualified name (`xml:lang`), or `undefined`
   */
  attribute(name: string): string | undefined {
    return this.attributes.get(name);
  }

  /** All descendants in document order, not including this element */
  *descendants(): Generator<XmlElement> {
    for (const element of this.elements) {
      yield element;
      yield* element.descendants();
    }
  }

  /**
   * Elements matching a slash-separated path of local names.
   *
   * A leading `//` matches the first step against this element and any of its
   * descendants; otherwise the first step matches direct children. `*` matches
   * any name.
   */
  findAll(path: string): XmlElement[] {
    const anywhere = path.startsWith("//");
    const steps = path.replace(/^\/+/, "").split("/").filter((step) => step !== "");
    const [first, ...rest] = steps;
    if (first === undefined) {
      return [];
    }

    const matches = (element: XmlElement, step: string): boolean =>
      step === "*" || element.localName === step;

    let current: XmlElement[] = anywhere
      ? [this, ...this.descendants()].filter((element) => matches(element, first))
      : this.elements.filter((element) => matches(element, first));

    for (const step of rest) {
      current = current.flatMap((element) =>
        element.elements.filter((child) => matches(child, step))
      );
    }

    return current;
  }

  find(path: string): XmlElement | undefined {
    return this.findAll(path)[0];
  }

  /**
   * Trimmed text of the first match, or `undefined` when nothing matches or
   * the match is empty
   */
  findText(path: string): string | undefined {
    const text = this.find(path)?.text.trim();
    return text === undefined || text === "" ? undefined : text;
  }

  /** Serialize this element (and its subtree) back to XML text */
  toXml(): string {
    const built: unknown = builder.build([toOrdered(this)]);
    return String(built);
  }
}

// ============================================================================
// Conversion
// ============================================================================

function toOrdered(element: XmlElement): OrderedNode {
  const node: OrderedNode = {
    [element.name]: element.children.map((child) =>
      typeof child === "string" ? { [TEXT_KEY]: child } : toOrdered(child)
    ),
  };
  if (element.attributes.size > 0) {
    const attributes: Record<string, string> = {};
    for (const [name, value] of element.attributes) {
      attributes[`${ATTRIBUTE_PREFIX}${name}`] = value;
    }
    node[ATTRIBUTES_KEY] = attributes;
  }
  return node;
}

function fromOrdered(node: OrderedNode): XmlChild | undefined {
  const attributes = new Map<string, string>();
  const rawAttributes = node[ATTRIBUTES_KEY];
  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      if (key.startsWith(ATTRIBUTE_PREFIX)) {
        attributes.set(key.slice(ATTRIBUTE_PREFIX.length), String(value));
      }
    }
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === ATTRIBUTES_KEY) {
      continue;
    }
    if (key === TEXT_KEY) {
      return String(value);
    }
    const children = Array.isArray(value) ? convertChildren(value) : [];
    return new XmlElement(key, attributes, children);
  }

  return undefined;
}

function convertChildren(nodes: unknown[]): XmlChild[] {
  const children: XmlChild[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const child = fromOrdered(node);
    if (child !== undefined) {
      children.push(child);
    }
  }
  return children;
}

/**
 * Parse an XML document and return its root element.
 *
 * Throws when the text is not well-formed XML or has no root element.
 */
export function parseXml(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new Error(
      `Malformed XML at line ${String(line)}, column ${String(col)}: ${msg}`
    );
  }

  const parsed: unknown = parser.parse(xml);
  const nodes = Array.isArray(parsed) ? convertChildren(parsed) : [];
  const root = nodes.find(
    (node): node is XmlElement => node instanceof XmlElement
  );
  if (root === undefined) {
    throw new Error("XML document has no root element");
  }
  return root;
}
