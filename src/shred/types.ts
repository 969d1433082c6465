/**
 * Types for the shredding stage
 */

import type { WarningKind } from '../lib/errors.js';
import type { SidecarCategory } from '../lib/tokens.js';

export type { SidecarCategory } from '../lib/tokens.js';

/** One article as read from the archive */
export interface ArticleSource {
  readonly id: string;
  readonly title: string;
  /** Article HTML */
  readonly markup: string;
}

/** Where an extracted element sat in the article */
export interface ElementAnchor {
  /** Structural path, e.g. `html[0]/body[0]/table[1]` */
  readonly path: string;
  /** Character offset of the placeholder in the Markdown */
  readonly offset: number;
}

export interface TablePayload {
  readonly caption: string | null;
  /** Header row when the first row consists of header cells only */
  readonly header: readonly string[] | null;
  /** Data rows (header excluded), padded to `columnCount` */
  readonly rows: readonly (readonly string[])[];
  readonly csv: string;
  readonly rowCount: number;
  readonly columnCount: number;
}

export interface InfoboxPayload {
  readonly type: string;
  readonly title: string | null;
  readonly fields: Readonly<Record<string, string>>;
  /** Original markup of the box */
  readonly raw: string;
}

export type FormulaDisplay = 'inline' | 'block';

export interface FormulaPayload {
  readonly tex: string;
  /** Original markup of the formula element */
  readonly markup: string;
  readonly display: FormulaDisplay;
}

interface SidecarEntryBase {
  readonly tokenId: string;
  readonly label: string;
  readonly anchor: ElementAnchor;
  /** Payload is a best-effort recovery */
  readonly degraded: boolean;
  readonly warnings: readonly string[];
}

export interface TableEntry extends SidecarEntryBase {
  readonly category: 'TABLE';
  readonly payload: TablePayload;
}

export interface InfoboxEntry extends SidecarEntryBase {
  readonly category: 'INFOBOX';
  readonly payload: InfoboxPayload;
}

export interface FormulaEntry extends SidecarEntryBase {
  readonly category: 'FORMULA';
  readonly payload: FormulaPayload;
}

/** An element moved out of the Markdown */
export type SidecarEntry = TableEntry | InfoboxEntry | FormulaEntry;

/** Reference to an image kept inside the archive */
export interface ImageLocator {
  /** `zim://I/<filename>` */
  readonly locator: string;
  readonly filename: string;
  readonly alt: string;
  readonly originalSrc: string;
  /** Owning sidecar entry, for images inside extracted elements */
  readonly tokenId?: string;
}

/** Internal link with a normalized target */
export interface WikiLink {
  readonly target: string;
  readonly text: string;
}

export interface TocEntry {
  readonly level: number;
  readonly title: string;
}

export interface ShredWarning {
  readonly kind: WarningKind;
  readonly message: string;
  /** Structural path of the offending element */
  readonly path: string;
  readonly tokenId?: string;
}

/** Result of shredding one article */
export interface ShreddedDocument {
  readonly articleId: string;
  readonly title: string;
  readonly markdown: string;
  readonly sidecar: readonly SidecarEntry[];
  readonly images: readonly ImageLocator[];
  readonly links: readonly WikiLink[];
  readonly toc: readonly TocEntry[];
  readonly abstract: string;
  readonly warnings: readonly ShredWarning[];
}

/** Payload type for a category */
export type PayloadFor<C extends SidecarCategory> = Extract<SidecarEntry, { category: C }>['payload'];

/** What an extractor produced for one heavy element */
export interface Extraction<P> {
  readonly payload: P;
  readonly label: string;
  readonly degraded: boolean;
  readonly warnings: readonly string[];
}
