/**
 * SaxEventSource - element notifications from a streaming XML parser
 *
 * Adapts saxes events into the enter / text / exit notifications the
 * engine consumes:
 *
 * - enter: every element, with an attribute accessor by local name
 * - text:  only for elements the consumer asks for, carrying all character
 *          data (entities resolved, CDATA included, descendants included)
 *          between start and end tag, sent just before the exit. Wanted
 *          elements may nest; each one gets its own text notification.
 * - exit:  every element
 *
 * Element names are local names; namespace prefixes are ignored.
 * Malformed markup and a document that ends with open elements raise
 * StreamReadError. Errors thrown by the handler pass through unchanged.
 */

import { SaxesParser } from "saxes";

import { StreamReadError } from "../../engine/errors.js";
import { scopedLogger } from "../../logging/index.js";

import { truncateText } from "./utils/xmlValueParsing.js";

import type { NotificationHandler } from "../../types/index.js";

const logger = scopedLogger("SAX SOURCE");

export interface SaxEventSourceOptions {
  /** Elements whose text should be accumulated and delivered. */
  wantsText: (name: string) => boolean;
  /** Characters kept per captured element; the rest is cut off. */
  maxTextLength?: number;
  /** Used in parser error messages. */
  fileName?: string;
}

type ParserOptions = { xmlns: true; fileName?: string };

interface TextCapture {
  name: string;
  /** Element depth of the captured element; the root is depth 1. */
  depth: number;
  text: string;
  /** Set once the text was cut at maxTextLength. */
  full: boolean;
}

export class SaxEventSource {
  private readonly parser: SaxesParser<ParserOptions>;
  private readonly handler: NotificationHandler;
  private readonly wantsText: (name: string) => boolean;
  private readonly maxTextLength: number;
  private readonly captures: TextCapture[] = [];
  private depth = 0;
  private closed = false;

  constructor(handler: NotificationHandler, options: SaxEventSourceOptions) {
    this.handler = handler;
    this.wantsText = options.wantsText;
    this.maxTextLength = options.maxTextLength ?? Number.MAX_SAFE_INTEGER;
    const parserOptions: ParserOptions = { xmlns: true };
    if (options.fileName !== undefined) {
      parserOptions.fileName = options.fileName;
    }
    this.parser = new SaxesParser(parserOptions);

    this.parser.on("error", (err) => {
      throw new StreamReadError(`XML read error: ${err.message}`, err);
    });

    this.parser.on("opentag", (tag) => {
      const name = tag.local;
      this.depth++;

      const attributes = Object.values(tag.attributes);
      this.handler({
        kind: "enter",
        name,
        attribute: (attributeName) => attributes.find((attr) => attr.local === attributeName)?.value,
      });

      if (this.wantsText(name)) {
        this.captures.push({ name, depth: this.depth, text: "", full: false });
      }
    });

    this.parser.on("text", (text) => this.appendText(text));
    this.parser.on("cdata", (cdata) => this.appendText(cdata));

    this.parser.on("closetag", (tag) => {
      const capture = this.captures.at(-1);
      if (capture && capture.depth === this.depth) {
        this.captures.pop();
        this.handler({ kind: "text", name: capture.name, text: capture.text });
      }
      this.handler({ kind: "exit", name: tag.local });
      this.depth--;
    });
  }

  write(chunk: string): void {
    if (this.closed) {
      throw new StreamReadError("Cannot write to a closed event source");
    }
    this.parser.write(chunk);
  }

  /**
   * Signal end of input. Throws StreamReadError when the document is
   * incomplete.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.parser.close();
    logger.debug("Document complete");
  }

  private appendText(text: string): void {
    for (const capture of this.captures) {
      if (capture.full) {
        continue;
      }
      const room = this.maxTextLength - capture.text.length;
      const kept = truncateText(text, room);
      capture.text += kept;
      capture.full = kept.length < text.length;
    }
  }
}
