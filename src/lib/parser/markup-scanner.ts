/**
 * Markup event scanner built on the htmlparser2 streaming tokenizer
 */

import { Parser } from "htmlparser2";

export interface MarkupAttribute {
  name: string;
  value: string;
}

export type MarkupEvent =
  | { type: "open"; name: string; attributes: MarkupAttribute[] }
  | { type: "close"; name: string }
  | { type: "text"; text: string };

/**
 * Receives scanner events in document order
 */
export interface MarkupEventHandler {
  handleEvent(event: MarkupEvent): void;
}

/**
 * Tokenize markup and push each event to the handler.
 *
 * Entities are left encoded; the normalizer decodes them after whitespace
 * has been collapsed. Tag and attribute names arrive lower-cased. Void
 * elements produce an open event immediately followed by a close event.
 */
export function scanMarkup(markup: string, handler: MarkupEventHandler): void {
  const parser = new Parser(
    {
      onopentag(name, attribs) {
        handler.handleEvent({
          type: "open",
          name,
          attributes: Object.entries(attribs).map(([attrName, value]) => ({
            name: attrName,
            value,
          })),
        });
      },
      onclosetag(name) {
        handler.handleEvent({ type: "close", name });
      },
      ontext(text) {
        handler.handleEvent({ type: "text", text });
      },
    },
    {
      decodeEntities: false,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
    }
  );

  parser.end(markup);
}

/**
 * Tokenize markup into an event array
 */
export function collectMarkupEvents(markup: string): MarkupEvent[] {
  const events: MarkupEvent[] = [];
  scanMarkup(markup, { handleEvent: (event) => events.push(event) });
  return events;
}

/**
 * Look up an attribute value; the first occurrence wins
 */
export function getAttribute(attributes: MarkupAttribute[], name: string): string | undefined {
  return attributes.find((attr) => attr.name === name)?.value;
}
