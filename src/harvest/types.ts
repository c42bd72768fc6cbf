/**
 * One numeric reading taken from a data row.
 */
export type Measurement = {
  /** First cell of the row, trimmed but otherwise as written by the instrument */
  timestamp: string;
  /** Instrument id taken from the export file name */
  source: string;
  /** Header label bound to the column */
  channel: string;
  value: number;
  /** Base name of the export file */
  origin: string;
};

/**
 * Where a named channel sits in each data row.
 */
export type ChannelBinding = {
  name: string;
  column: number;
};

/**
 * Per-file read position and header state, owned by the file set.
 */
export type FileTrackingState = {
  readonly path: string;
  readonly origin: string;
  readonly source: string;
  /** False while the header is still being looked for */
  headerKnown: boolean;
  channelBindings: ChannelBinding[];
  /** Byte offset just past the last complete line consumed */
  cursor: number;
  /** Bytes already read after `cursor` that do not end in a line break yet */
  pendingTail: Buffer;
  /** Inode seen on the last successful stat, used to notice replaced files */
  fileId: number | null;
};
