import { XMLParser, XMLValidator } from "fast-xml-parser";
import { AtdfError } from "./errors.js";
import { asArray } from "./util.js";

type RawElement = { [key: string | symbol]: unknown };

export type XmlAttribute = {
  key: string;
  value: string;
};

const attributePrefix = "@_";

const metaSymbol: unknown = XMLParser.getMetaDataSymbol();

function isRawElement(v: unknown): v is RawElement {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function startIndexOf(raw: RawElement): number | undefined {
  if (typeof metaSymbol !== "symbol") return undefined;
  const meta = raw[metaSymbol];
  if (!isRawElement(meta)) return undefined;
  const start = meta.startIndex;
  return typeof start === "number" ? start : undefined;
}

/** Maps character offsets of the source text to 1-based line numbers. */
export class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.starts.push(i + 1);
    }
  }

  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.starts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return lo + 1;
  }
}

export class XmlNode {
  constructor(
    readonly name: string,
    private readonly raw: RawElement,
    private readonly lines: LineIndex,
  ) {}

  get line(): number | undefined {
    const start = startIndexOf(this.raw);
    return start === undefined ? undefined : this.lines.lineAt(start);
  }

  getAttribute(key: string): string | undefined {
    const v = this.raw[attributePrefix + key];
    if (typeof v === "string") return v;
    if (typeof v === "number" || typeof v === "boolean") return String(v);
    return undefined;
  }

  attributes(): XmlAttribute[] {
    const out: XmlAttribute[] = [];
    for (const key of Object.keys(this.raw)) {
      if (!key.startsWith(attributePrefix)) continue;
      const name = key.slice(attributePrefix.length);
      out.push({ key: name, value: this.getAttribute(name) ?? "" });
    }
    return out;
  }

  children(tag: string): XmlNode[] {
    return asArray<unknown>(this.raw[tag]).map((v) => new XmlNode(tag, isRawElement(v) ? v : {}, this.lines));
  }

  /** Children named `tag` found under the chain of `path` elements. */
  iterate(path: string[], tag: string): XmlNode[] {
    let level: XmlNode[] = [this];
    for (const step of path) {
      level = level.flatMap((n) => n.children(step));
    }
    return level.flatMap((n) => n.children(tag));
  }

  findChild(tag: string): XmlNode | undefined {
    return this.children(tag)[0];
  }
}

export class XmlDoc {
  private constructor(private readonly rootNode: XmlNode) {}

  static fromText(text: string): XmlDoc {
    const valid = XMLValidator.validate(text);
    if (valid !== true) {
      throw new AtdfError("parse", "MalformedXml", "line {line}: {msg}", {
        line: valid.err.line,
        msg: valid.err.msg,
      });
    }
    const parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: attributePrefix,
      parseAttributeValue: false,
      parseTagValue: false,
      ignoreDeclaration: true,
      ignorePiTags: true,
      captureMetaData: true,
      isArray: (_tag, _path, _leaf, isAttribute) => !isAttribute,
    });
    const doc: unknown = parser.parse(text);
    const lines = new LineIndex(text);
    if (isRawElement(doc)) {
      for (const key of Object.keys(doc)) {
        if (key.startsWith("?") || key.startsWith("#")) continue;
        const first = asArray<unknown>(doc[key])[0];
        return new XmlDoc(new XmlNode(key, isRawElement(first) ? first : {}, lines));
      }
    }
    throw new AtdfError("parse", "MissingRootElement", "document has no root element");
  }

  root(): XmlNode {
    return this.rootNode;
  }
}
