/**
 * Ordered element tree for the order template.
 *
 * Element names keep their namespace prefix ("tc:OrderLine"); paths match on
 * the local part. Text values are held entity-escaped, exactly as they are
 * written to the output document. CDATA sections, comments and processing
 * instructions are carried through untouched.
 */
export interface XmlElement {
  kind: "element";
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
}

export interface XmlText {
  kind: "text";
  value: string;
}

/** Raw section content, never escaped. */
export interface XmlCData {
  kind: "cdata";
  value: string;
}

export interface XmlComment {
  kind: "comment";
  value: string;
}

export interface XmlProcessingInstruction {
  kind: "pi";
  target: string;
  attributes: Record<string, string>;
}

export type XmlNode = XmlElement | XmlText | XmlCData | XmlComment | XmlProcessingInstruction;

/** Nodes outside the root element (comments, processing instructions). */
export type XmlMisc = XmlComment | XmlProcessingInstruction;

export interface XmlDocument {
  prolog: XmlMisc[];
  root: XmlElement;
  epilog: XmlMisc[];
}
