import {
  type ExtractionResult,
  type Segment,
  UnsupportedFormatError,
  errorMessage,
} from "@mediasift/utils";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { buildResult } from "../lib/result.js";
import type { ExtractInput, ExtractionContext, Extractor } from "../types.js";

interface FlattenState {
  segments: Segment[];
  offset: number;
  elementCount: number;
  rootElement: string | null;
}

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

export class XmlExtractor implements Extractor {
  readonly format = "xml";
  readonly name = "xml";
  readonly version = "1";

  private parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
  });

  async extract(input: ExtractInput, ctx: ExtractionContext): Promise<ExtractionResult> {
    const xml = input.bytes.toString("utf-8").replace(/^\uFEFF/, "");

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      const { msg, line, col } = validation.err;
      throw new UnsupportedFormatError("Malformed XML", `${msg} (line ${line}, column ${col})`);
    }

    let tree: unknown;
    try {
      tree = this.parser.parse(xml);
    } catch (err) {
      throw new UnsupportedFormatError("Malformed XML", errorMessage(err));
    }

    const state: FlattenState = { segments: [], offset: 0, elementCount: 0, rootElement: null };
    this.flatten(tree, [], state, ctx.signal);

    return buildResult(
      this,
      input,
      { rootElement: state.rootElement, elementCount: state.elementCount },
      state.segments,
    );
  }

  /** Walks the order-preserving tree depth first, one text segment per text node. */
  private flatten(nodes: unknown, path: string[], state: FlattenState, signal: AbortSignal): void {
    if (!Array.isArray(nodes)) return;
    signal.throwIfAborted();

    for (const node of nodes) {
      if (typeof node !== "object" || node === null) continue;

      for (const [key, value] of Object.entries(node)) {
        if (key === ATTRIBUTES_KEY || key.startsWith("?")) continue;

        if (key === TEXT_KEY) {
          const text = String(value).trim();
          if (text.length === 0) continue;
          state.segments.push({
            type: "text",
            page: null,
            offset: state.offset,
            path: path.join("/"),
            text,
          });
          state.offset += text.length + 1;
          continue;
        }

        state.elementCount++;
        state.rootElement ??= key;
        this.flatten(value, [...path, key], state, signal);
      }
    }
  }
}
