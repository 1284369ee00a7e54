/**
 * Namespace-aware XML tokenizer built on htmlparser2's SAX callbacks.
 *
 * htmlparser2 recovers from broken markup instead of rejecting it, so the
 * document is checked with fast-xml-parser's validator first. The validator
 * does not look at entity references, attribute values or trailing root
 * elements; those are checked while the events are collected. Events reach
 * the handlers only once the whole document has been read without error.
 */

import { XMLValidator } from "fast-xml-parser";
import { Parser } from "htmlparser2";

import { qualifiedName } from "./constants.js";
import type {
  XmlAttributes,
  XmlEventHandlers,
  XmlParseStatus,
  XmlTokenizer,
} from "./types.js";

const XMLNS = "xmlns" as const;
const XMLNS_PREFIX = "xmlns:" as const;
const XML_NAMESPACE = "http://www.w3.org/XML/1998/namespace" as const;

const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ["amp", "&"],
  ["lt", "<"],
  ["gt", ">"],
  ["quot", '"'],
  ["apos", "'"],
]);

const REFERENCE_PATTERN =
  /^&(?:#x([0-9A-Fa-f]+)|#([0-9]+)|([A-Za-z_:][\w.:-]*));/u;

type NamespaceScope = ReadonlyMap<string, string>;

type TokenizerEvent =
  | { type: "start"; name: string; attributes: XmlAttributes }
  | { type: "end"; name: string }
  | { type: "text"; text: string };

class XmlSyntaxError extends Error {
  constructor(
    message: string,
    public readonly index: number,
  ) {
    super(message);
    this.name = "XmlSyntaxError";
  }
}

export function createXmlTokenizer(handlers: XmlEventHandlers): XmlTokenizer {
  return {
    parse(xml: string): XmlParseStatus {
      const validation = XMLValidator.validate(xml);
      if (validation !== true) {
        const { msg, line, col } = validation.err;
        return { ok: false, message: msg, line, column: col };
      }

      let events: TokenizerEvent[];
      try {
        events = collectEvents(xml);
      } catch (error) {
        if (error instanceof XmlSyntaxError) {
          return {
            ok: false,
            message: error.message,
            ...positionAt(xml, error.index),
          };
        }
        throw error;
      }

      for (const event of events) {
        switch (event.type) {
          case "start":
            handlers.onStartElement(event.name, event.attributes);
            break;
          case "end":
            handlers.onEndElement(event.name);
            break;
          case "text":
            handlers.onText(event.text);
            break;
        }
      }

      return { ok: true };
    },
  };
}

function collectEvents(xml: string): TokenizerEvent[] {
  const events: TokenizerEvent[] = [];
  const scopes: NamespaceScope[] = [new Map([["xml", XML_NAMESPACE]])];
  const currentScope = (): NamespaceScope => scopes[scopes.length - 1] ?? new Map();

  let depth = 0;
  let rootSeen = false;
  let inCdata = false;
  let pendingText = "";
  let pendingIndex = 0;

  // Character data arrives raw; references are decoded once a run of text
  // is complete.
  const flushText = (): void => {
    if (pendingText.length === 0) {
      return;
    }
    const raw = pendingText;
    pendingText = "";

    if (depth === 0) {
      if (raw.trim().length > 0) {
        throw new XmlSyntaxError("text outside the document element", pendingIndex);
      }
      return;
    }
    events.push({ type: "text", text: decodeReferences(raw, pendingIndex) });
  };

  const parser: Parser = new Parser(
    {
      onopentag(name, attribs) {
        flushText();
        const at = parser.startIndex;
        if (depth === 0 && rootSeen) {
          throw new XmlSyntaxError("junk after document element", at);
        }
        rootSeen = true;

        const scope = extendScope(currentScope(), attribs);
        scopes.push(scope);
        depth += 1;
        events.push({
          type: "start",
          name: resolveName(name, scope, true, at),
          attributes: resolveAttributes(attribs, scope, at),
        });
      },

      onclosetag(name) {
        flushText();
        events.push({
          type: "end",
          name: resolveName(name, currentScope(), true, parser.startIndex),
        });
        if (scopes.length > 1) {
          scopes.pop();
        }
        depth = Math.max(0, depth - 1);
      },

      ontext(text) {
        if (inCdata) {
          events.push({ type: "text", text });
          return;
        }
        if (pendingText.length === 0) {
          pendingIndex = parser.startIndex;
        }
        pendingText += text;
      },

      oncdatastart() {
        flushText();
        inCdata = true;
      },

      oncdataend() {
        inCdata = false;
      },
    },
    {
      xmlMode: true,
      decodeEntities: false,
    },
  );

  parser.write(xml);
  parser.end();
  flushText();

  if (!rootSeen) {
    throw new XmlSyntaxError("no element found", xml.length);
  }

  return events;
}

function decodeReferences(raw: string, index: number): string {
  let decoded = "";
  let cursor = 0;

  for (
    let ampersand = raw.indexOf("&");
    ampersand !== -1;
    ampersand = raw.indexOf("&", cursor)
  ) {
    decoded += raw.slice(cursor, ampersand);
    const match = REFERENCE_PATTERN.exec(raw.slice(ampersand));
    if (!match) {
      throw new XmlSyntaxError("malformed entity reference", index + ampersand);
    }

    const [reference, hex, decimal, name] = match;
    decoded += resolveReference(reference, hex, decimal, name, index + ampersand);
    cursor = ampersand + reference.length;
  }

  return decoded + raw.slice(cursor);
}

function resolveReference(
  reference: string,
  hex: string | undefined,
  decimal: string | undefined,
  name: string | undefined,
  index: number,
): string {
  if (name !== undefined) {
    const value = PREDEFINED_ENTITIES.get(name);
    if (value === undefined) {
      throw new XmlSyntaxError(`undefined entity "${reference}"`, index);
    }
    return value;
  }

  const codePoint =
    hex !== undefined ? Number.parseInt(hex, 16) : Number(decimal);
  if (!isXmlChar(codePoint)) {
    throw new XmlSyntaxError(`invalid character reference "${reference}"`, index);
  }
  return String.fromCodePoint(codePoint);
}

function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xa ||
    codePoint === 0xd ||
    (codePoint >= 0x20 && codePoint <= 0xd7ff) ||
    (codePoint >= 0xe000 && codePoint <= 0xfffd) ||
    (codePoint >= 0x10000 && codePoint <= 0x10ffff)
  );
}

function decodeAttributeValue(raw: string, index: number): string {
  if (raw.includes("<")) {
    throw new XmlSyntaxError('"<" not allowed in attribute value', index);
  }
  return decodeReferences(raw.replace(/[\t\n\r]/gu, " "), index);
}

function extendScope(
  parent: NamespaceScope,
  attribs: Record<string, string>,
): NamespaceScope {
  let scope: Map<string, string> | undefined;

  for (const [name, value] of Object.entries(attribs)) {
    let prefix: string | undefined;
    if (name === XMLNS) {
      prefix = "";
    } else if (name.startsWith(XMLNS_PREFIX)) {
      prefix = name.slice(XMLNS_PREFIX.length);
    }

    if (prefix === undefined) {
      continue;
    }

    scope ??= new Map(parent);
    if (value.length === 0) {
      scope.delete(prefix);
    } else {
      scope.set(prefix, value);
    }
  }

  return scope ?? parent;
}

function resolveName(
  name: string,
  scope: NamespaceScope,
  isElement: boolean,
  index: number,
): string {
  const separator = name.indexOf(":");
  if (separator === -1) {
    const defaultNamespace = isElement ? scope.get("") : undefined;
    return defaultNamespace ? qualifiedName(defaultNamespace, name) : name;
  }

  const prefix = name.slice(0, separator);
  const namespaceUri = scope.get(prefix);
  if (!namespaceUri) {
    throw new XmlSyntaxError(`unbound prefix "${prefix}"`, index);
  }
  return qualifiedName(namespaceUri, name.slice(separator + 1));
}

function resolveAttributes(
  attribs: Record<string, string>,
  scope: NamespaceScope,
  index: number,
): XmlAttributes {
  const resolved: Record<string, string> = {};
  for (const [name, value] of Object.entries(attribs)) {
    if (name === XMLNS || name.startsWith(XMLNS_PREFIX)) {
      continue;
    }
    resolved[resolveName(name, scope, false, index)] = decodeAttributeValue(
      value,
      index,
    );
  }
  return resolved;
}

function positionAt(xml: string, index: number): { line: number; column: number } {
  const before = xml.slice(0, index);
  return {
    line: before.split("\n").length,
    column: index - before.lastIndexOf("\n"),
  };
}
