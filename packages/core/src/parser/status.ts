/**
 * Status replies: idevsutil mixes XML-like tags into free text, e.g.
 *
 *   connecting...
 *   <tree message="SUCCESS" desc="VALID ACCOUNT" configstatus="SET" configtype="DEFAULT"/>
 *
 * Only the tag substrings are kept; they are wrapped in a synthetic root
 * element and parsed as one document.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const ROOT_TAG = "root";

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  parseAttributeValue: false,
  parseTagValue: false,
  preserveOrder: true,
});

export type StatusAttributes = Readonly<Record<string, string>>;

export interface StatusElement {
  tag: string;
  attributes: StatusAttributes;
}

export class StatusDocument {
  constructor(public readonly elements: readonly StatusElement[]) {}

  /** Attributes of the first element named `tag`, in document order. */
  find(tag: string): StatusAttributes | null {
    return this.elements.find((element) => element.tag === tag)?.attributes ?? null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): StatusAttributes {
  if (!isRecord(raw)) return {};
  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const name = key.startsWith(ATTRIBUTE_PREFIX)
      ? key.slice(ATTRIBUTE_PREFIX.length)
      : key;
    attributes[name] = String(value);
  }
  return attributes;
}

/** Flatten preserveOrder output depth-first, keeping document order. */
function collectElements(nodes: unknown, out: StatusElement[]): void {
  if (!Array.isArray(nodes)) return;
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [tag, children] of Object.entries(node)) {
      if (tag === ATTRIBUTES_KEY || tag === "#text") continue;
      out.push({ tag, attributes: toAttributes(node[ATTRIBUTES_KEY]) });
      collectElements(children, out);
    }
  }
}

/** Tag-like substrings, minus declarations and processing instructions. */
export function extractTags(raw: string): string[] {
  return (raw.match(/<[^>]+>/g) ?? []).filter(
    (tag) => !tag.startsWith("<?") && !tag.startsWith("<!"),
  );
}

/**
 * Parse the tags found in `raw` into a StatusDocument.
 * Returns null ("no data") when there are no tags or they do not form a
 * well-formed document.
 */
export function parseStatusDocument(raw: string): StatusDocument | null {
  const tags = extractTags(raw);
  if (tags.length === 0) return null;

  const xml = `<${ROOT_TAG}>${tags.join("")}</${ROOT_TAG}>`;
  if (XMLValidator.validate(xml) !== true) return null;

  const parsed: unknown = xmlParser.parse(xml);
  if (!Array.isArray(parsed)) return null;

  const rootNode = parsed.find(
    (node): node is Record<string, unknown> => isRecord(node) && ROOT_TAG in node,
  );
  if (!rootNode) return null;

  const elements: StatusElement[] = [];
  collectElements(rootNode[ROOT_TAG], elements);
  return new StatusDocument(elements);
}

const FAILURE_MESSAGES = new Set(["ERROR", "FAILURE"]);

/**
 * Text of the first element reporting failure (`message="ERROR"` or
 * `message="FAILURE"`), preferring its `desc`; null when none does.
 */
export function findFailureMarker(document: StatusDocument | null): string | null {
  if (!document) return null;
  for (const { attributes } of document.elements) {
    const message = attributes.message;
    if (message !== undefined && FAILURE_MESSAGES.has(message.toUpperCase())) {
      return attributes.desc ?? message;
    }
  }
  return null;
}
