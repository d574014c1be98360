import JSZip from 'jszip';
import { DEFAULT_DOCUMENT_FILES, type DocumentFiles } from '../config.js';
import { describeCause, PersistenceError } from '../errors.js';
import { parseUrdf, type UrdfDocument } from '../graph/urdf.js';
import { VIEW_KINDS, type LoadedView, type ViewDocuments } from '../identifiers/types.js';

export type ZipInput = Blob | ArrayBuffer | Uint8Array;

export interface RobotBundle {
  views: ViewDocuments;
  urdf?: UrdfDocument;
}

/**
 * Loads a robot's documents from a zip. Each document is matched by file base
 * name anywhere in the archive; views that are missing or unreadable come
 * back as unavailable, a missing URDF as `undefined`.
 */
export async function readRobotArchive(
  zip: ZipInput,
  files: DocumentFiles = DEFAULT_DOCUMENT_FILES
): Promise<RobotBundle> {
  const zipData = zip instanceof Uint8Array ? zip : new Uint8Array(await toArrayBuffer(zip));
  const archive = await JSZip.loadAsync(zipData);
  const entries = Object.values(archive.files).filter((file) => !file.dir);
  const fileMap = new Map<string, JSZip.JSZipObject>();
  for (const entry of entries) {
    fileMap.set(normalizePath(entry.name), entry);
  }

  const loaded = await Promise.all(
    VIEW_KINDS.map(async (kind): Promise<LoadedView> => {
      const entry = resolveEntry(fileMap, files[kind]);
      if (!entry) return { status: 'unavailable', reason: `${files[kind]} not found in archive` };
      try {
        return { status: 'loaded', data: JSON.parse(await entry.async('string')) };
      } catch (error) {
        return { status: 'unavailable', reason: `invalid JSON in ${entry.name}: ${describeCause(error)}` };
      }
    })
  );
  const views: ViewDocuments = { values: loaded[0], features: loaded[1], assembly: loaded[2] };

  const urdfEntry = resolveEntry(fileMap, files.urdf);
  if (!urdfEntry) return { views };
  return { views, urdf: parseUrdf(await urdfEntry.async('string')) };
}

/**
 * Packs the loaded views and the URDF at the archive root under their
 * configured file names.
 */
export async function writeRobotArchive(
  bundle: RobotBundle,
  files: DocumentFiles = DEFAULT_DOCUMENT_FILES
): Promise<Uint8Array> {
  const zip = new JSZip();
  for (const kind of VIEW_KINDS) {
    const view = bundle.views[kind];
    if (view.status === 'loaded') {
      zip.file(files[kind], `${JSON.stringify(view.data, null, 2)}\n`);
    }
  }
  if (bundle.urdf) zip.file(files.urdf, bundle.urdf.serialize());
  return zip.generateAsync({ type: 'uint8array', compression: 'DEFLATE' });
}

function resolveEntry(
  fileMap: Map<string, JSZip.JSZipObject>,
  fileName: string
): JSZip.JSZipObject | undefined {
  const candidates = [...fileMap.keys()].filter(
    (name) => name === fileName || name.endsWith(`/${fileName}`)
  );
  if (candidates.length === 0) return undefined;
  if (candidates.length > 1) {
    throw new PersistenceError(`Multiple ${fileName} files found in archive: ${candidates.join(', ')}`);
  }
  return fileMap.get(candidates[0]);
}

async function toArrayBuffer(input: Blob | ArrayBuffer): Promise<ArrayBuffer> {
  if (input instanceof ArrayBuffer) return input;
  return await input.arrayBuffer();
}

function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+/g, '/');
}
