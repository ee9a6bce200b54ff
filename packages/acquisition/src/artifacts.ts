/**
 * Artifact Store
 * 
 * The supervisor's view of the target directory. Production reads the
 * filesystem; tests substitute an in-memory store.
 */

import { getFileSizeOrNull } from '@reeldrop/utils';

export interface ArtifactStore {
  /** Size in bytes, or null when nothing exists at `path` */
  sizeOf(path: string): Promise<number | null>;
}

export const fsArtifactStore: ArtifactStore = {
  sizeOf: getFileSizeOrNull,
};
