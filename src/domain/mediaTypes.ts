const GENERIC_MEDIA_TYPES = new Set(['', 'application/octet-stream', 'binary/octet-stream']);

const EVENT_LOG_EXTENSIONS = ['.csv.gz', '.csv', '.xes.gz', '.xes', '.xml'];

/**
 * Infers the stored extension of an uploaded event log.
 * The declared media type wins; generic media types fall back to the file name.
 * Returns null for anything that is not a CSV or XES log.
 */
export function inferEventLogExtension(mediaType: string, fileName: string): string | null {
  const type = mediaType.split(';')[0].trim().toLowerCase();

  if (type === 'text/csv' || type === 'application/csv') {
    return '.csv';
  }
  if (type === 'application/xml' || type === 'text/xml') {
    return '.xes';
  }

  if (GENERIC_MEDIA_TYPES.has(type) || type === 'application/gzip' || type === 'application/x-gzip') {
    const name = fileName.toLowerCase();
    const extension = EVENT_LOG_EXTENSIONS.find((candidate) => name.endsWith(candidate));
    if (!extension) {
      return null;
    }
    if (type.includes('gzip') && !extension.endsWith('.gz')) {
      return null;
    }
    return extension === '.xml' ? '.xes' : extension;
  }

  return null;
}

const MEDIA_TYPES: Array<[string, string]> = [
  ['.tar.gz', 'application/tar+gzip'],
  ['.tar.bz2', 'application/x-bzip2'],
  ['.csv', 'text/csv'],
  ['.xml', 'application/xml'],
  ['.xes', 'application/xml'],
  ['.bpmn', 'application/xml'],
  ['.json', 'application/json'],
  ['.yaml', 'text/yaml'],
  ['.yml', 'text/yaml'],
  ['.png', 'image/png'],
  ['.jpg', 'image/jpeg'],
  ['.jpeg', 'image/jpeg'],
  ['.pdf', 'application/pdf'],
  ['.txt', 'text/plain'],
  ['.zip', 'application/zip'],
  ['.gz', 'application/gzip'],
  ['.tar', 'application/tar'],
];

/**
 * Media type used when serving a stored artifact
 */
export function mediaTypeForFile(fileName: string): string {
  const name = fileName.toLowerCase();
  const match = MEDIA_TYPES.find(([extension]) => name.endsWith(extension));
  return match ? match[1] : 'application/octet-stream';
}
