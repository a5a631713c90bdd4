/**
 * Output that may be split over several files. The preamble passed to `start()` begins the
 * current output and every output started after it.
 */
export interface IRotatingWritable {
  start(preamble: Uint8Array): Promise<void>;

  // Append one record, rotating first if the record would not fit in the current output
  append(data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}
