// packages/store/src/extractors.ts
import * as fs from "node:fs";
import * as path from "node:path";
import Papa from "papaparse";

import { errorMessage } from "../../core/src/errors.js";
import { readHead } from "./fingerprint.js";

export type ExtractedMetadata = {
  format: string;
  [field: string]: unknown;
};

/**
 * Best-effort, format-specific metadata. Extractors may throw; the registry
 * turns any failure into a `metadata_error` field and registration goes on.
 */
export type MetadataExtractor = {
  format: string;
  extensions: string[]; // lower-case, with leading dot
  extract(filePath: string): Record<string, unknown>;
};

// keep meta files small
export const MAX_LISTED_COLUMNS = 2000;

const HEADER_PROBE_BYTES = 256 * 1024;

export class MetadataExtractorRegistry {
  private readonly byExtension = new Map<string, MetadataExtractor>();

  register(extractor: MetadataExtractor): this {
    for (const ext of extractor.extensions) {
      this.byExtension.set(ext.toLowerCase(), extractor);
    }
    return this;
  }

  forPath(filePath: string): MetadataExtractor | null {
    return this.byExtension.get(path.extname(filePath).toLowerCase()) ?? null;
  }

  extract(filePath: string): ExtractedMetadata {
    const extractor = this.forPath(filePath);
    if (!extractor) {
      return { format: formatTagFor(filePath), note: "minimal metadata" };
    }

    try {
      return { ...extractor.extract(filePath), format: extractor.format };
    } catch (e) {
      return { format: extractor.format, metadata_error: errorMessage(e) };
    }
  }
}

export function formatTagFor(filePath: string): string {
  return path.extname(filePath).toLowerCase().replace(/^\./, "");
}

/* ------------------------------------------------------------------ */
/*                          Delimited text                            */
/* ------------------------------------------------------------------ */

export function delimitedTextExtractor(format: "csv" | "tsv"): MetadataExtractor {
  return {
    format,
    extensions: [`.${format}`],
    extract(filePath) {
      const head = readHead(filePath, HEADER_PROBE_BYTES).toString("utf8");
      const firstLine = head.split(/\r?\n/, 1)[0] ?? "";
      const parsed = Papa.parse<string[]>(firstLine, {
        delimiter: format === "tsv" ? "\t" : "",
        preview: 1,
      });
      const columns = (parsed.data[0] ?? []).map((c) => c.trim());

      return {
        columns_count: columns.length,
        columns: columns.slice(0, MAX_LISTED_COLUMNS),
        columns_truncated: columns.length > MAX_LISTED_COLUMNS,
        delimiter: parsed.meta.delimiter,
      };
    },
  };
}

/* ------------------------------------------------------------------ */
/*                           ASAM MDF logs                            */
/* ------------------------------------------------------------------ */

// ID block: 64 bytes. MDF4 header block (##HD) follows at offset 64:
// 24-byte block header, 6 links, then hd_start_time_ns (uint64 LE).
const MDF_ID_BLOCK_SIZE = 64;
const MDF4_HD_START_TIME_OFFSET = MDF_ID_BLOCK_SIZE + 24 + 6 * 8;

export const mdfExtractor: MetadataExtractor = {
  format: "mf4",
  extensions: [".mf4", ".mdf"],
  extract(filePath) {
    const head = readHead(filePath, MDF4_HD_START_TIME_OFFSET + 8);
    if (head.length < MDF_ID_BLOCK_SIZE) {
      throw new Error(`MDF_TRUNCATED: ${head.length} bytes, identification block needs ${MDF_ID_BLOCK_SIZE}`);
    }

    const fileId = head.subarray(0, 8).toString("latin1");
    if (fileId !== "MDF     " && fileId !== "UnFinMF ") {
      throw new Error(`MDF_BAD_MAGIC: ${JSON.stringify(fileId)}`);
    }

    const version = head.subarray(8, 16).toString("latin1").trim();
    const versionNumber = head.readUInt16LE(28);

    const fields: Record<string, unknown> = {
      mdf_version: version,
      mdf_version_number: versionNumber,
      program_id: head.subarray(16, 24).toString("latin1").trim(),
      finalized: fileId === "MDF     ",
      start_time_unix: null,
    };

    if (
      versionNumber >= 400 &&
      head.length >= MDF4_HD_START_TIME_OFFSET + 8 &&
      head.subarray(64, 68).toString("latin1") === "##HD"
    ) {
      const ns = head.readBigUInt64LE(MDF4_HD_START_TIME_OFFSET);
      fields.start_time_unix = Number(ns / 1000n) / 1e6;

      const channels = readMdf4ChannelNames(filePath);
      fields.channels_count = channels.length;
      fields.channels = channels.slice(0, MAX_LISTED_COLUMNS);
      fields.channels_truncated = channels.length > MAX_LISTED_COLUMNS;
    }

    return fields;
  },
};

// Every MDF4 block: id (4), reserved (4), length u64, link count u64, links u64[].
const MDF4_BLOCK_HEADER_SIZE = 24;
const MDF4_MAX_BLOCKS = 1_000_000;

type Mdf4Block = {
  length: number;
  links: number[];
};

class Mdf4File {
  private readonly visited = new Set<number>();

  constructor(
    private readonly fd: number,
    private readonly size: number
  ) {}

  /** Read a block header and its links; each block may be entered once. */
  block(offset: number, id: string): Mdf4Block {
    if (this.visited.has(offset)) {
      throw new Error(`MDF_LINK_CYCLE: block at ${offset} is linked twice`);
    }
    if (this.visited.size >= MDF4_MAX_BLOCKS) {
      throw new Error(`MDF_TOO_MANY_BLOCKS: more than ${MDF4_MAX_BLOCKS}`);
    }
    this.visited.add(offset);

    const header = this.read(offset, MDF4_BLOCK_HEADER_SIZE);
    const found = header.subarray(0, 4).toString("latin1");
    if (found !== id) {
      throw new Error(`MDF_BAD_BLOCK: expected ${id} at ${offset}, found ${JSON.stringify(found)}`);
    }

    const length = Number(header.readBigUInt64LE(8));
    const linkCount = Number(header.readBigUInt64LE(16));
    const raw = this.read(offset + MDF4_BLOCK_HEADER_SIZE, linkCount * 8);
    const links: number[] = [];
    for (let i = 0; i < linkCount; i++) links.push(Number(raw.readBigUInt64LE(i * 8)));
    return { length, links };
  }

  /** Text of a ##TX block, up to its first NUL. */
  text(offset: number): string {
    const { length, links } = this.block(offset, "##TX");
    const start = offset + MDF4_BLOCK_HEADER_SIZE + links.length * 8;
    const body = this.read(start, Math.max(0, offset + length - start));
    const end = body.indexOf(0);
    return body.subarray(0, end < 0 ? body.length : end).toString("utf8");
  }

  private read(offset: number, length: number): Buffer {
    if (offset + length > this.size) {
      throw new Error(`MDF_TRUNCATED: read of ${length} bytes at ${offset} past end of file (${this.size} bytes)`);
    }
    const buf = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      const n = fs.readSync(this.fd, buf, filled, length - filled, offset + filled);
      if (n === 0) break;
      filled += n;
    }
    return buf;
  }
}

/**
 * Distinct channel names, sorted, from the HD -> DG -> CG -> CN chains.
 * Link 0 of DG, CG and CN is the next sibling; DG link 1 is the first CG,
 * CG link 1 the first CN, CN link 2 the name text.
 */
function readMdf4ChannelNames(filePath: string): string[] {
  const fd = fs.openSync(filePath, "r");
  try {
    const file = new Mdf4File(fd, fs.fstatSync(fd).size);
    const names = new Set<string>();

    let dg = file.block(MDF_ID_BLOCK_SIZE, "##HD").links[0] ?? 0;
    while (dg !== 0) {
      const group = file.block(dg, "##DG");
      let cg = group.links[1] ?? 0;
      while (cg !== 0) {
        const channelGroup = file.block(cg, "##CG");
        let cn = channelGroup.links[1] ?? 0;
        while (cn !== 0) {
          const channel = file.block(cn, "##CN");
          const name = channel.links[2] ?? 0;
          if (name !== 0) names.add(file.text(name));
          cn = channel.links[0] ?? 0;
        }
        cg = channelGroup.links[0] ?? 0;
      }
      dg = group.links[0] ?? 0;
    }

    return [...names].sort();
  } finally {
    fs.closeSync(fd);
  }
}

export function defaultExtractors(): MetadataExtractorRegistry {
  return new MetadataExtractorRegistry()
    .register(delimitedTextExtractor("csv"))
    .register(delimitedTextExtractor("tsv"))
    .register(mdfExtractor);
}
