/**
 * ArtifactStore Interface
 *
 * Where published chart bytes live. The publisher owns naming and the index;
 * a store only moves bytes.
 */

export interface ArtifactStore {
  /** Write bytes for an artifact id; returns the location to record */
  put(id: string, bytes: Buffer, contentType: string): Promise<string>;

  /** Bytes at a recorded location, or null when gone */
  read(location: string): Promise<Buffer | null>;

  /** Remove the bytes at a location; false when already gone */
  remove(location: string): Promise<boolean>;
}
