/**
 * PDF sanity checks for downloaded documents
 */

const PDF_MAGIC = '%PDF-';

/** Anything smaller is unlikely to be a real invoice */
export const MIN_PDF_SIZE = 1000;

export interface PdfInspection {
  isPdf: boolean;
  suspicious: boolean;
  reason?: string;
}

export function inspectPdf(data: Buffer): PdfInspection {
  const isPdf = data.subarray(0, PDF_MAGIC.length).toString('latin1') === PDF_MAGIC;

  if (!isPdf) {
    return { isPdf, suspicious: true, reason: 'missing %PDF- header' };
  }
  if (data.length < MIN_PDF_SIZE) {
    return { isPdf, suspicious: true, reason: `only ${data.length} bytes` };
  }
  return { isPdf, suspicious: false };
}
