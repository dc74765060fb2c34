// src/core/xml/types.ts

export interface XmlElement {
  kind: 'element';
  name: string; // Qualified name as written, prefix included
  attributes: Readonly<Record<string, string>>;
  children: readonly XmlNode[];
}

export interface XmlText {
  kind: 'text';
  value: string;
}

export type XmlNode = XmlElement | XmlText;

/**
 * A document that passed the textual safety gate and parsed as well-formed XML
 */
export interface SafeDocument {
  nodes: readonly XmlNode[]; // Top-level nodes in document order
}

export interface LoaderLimits {
  maxDocumentLength?: number; // Characters; unlimited when omitted
}
