import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { DocumentLoadError } from '../errors';
import type { PageEvents } from '../../types/report';
import type { PdfDocumentLike, PdfOperatorListLike, PdfPageLike } from '../../types/pdf';
import type { WaterRightNo } from '../../types/waterRight';
import { commonObjsFontResolver, drawingEventsFromOperatorList } from './operatorList';

export interface ReportSource {
  waterRightNo: WaterRightNo;
  readPages(): Promise<PageEvents[]>;
}

export async function loadReportDocument(bytes: Uint8Array): Promise<PdfDocumentLike> {
  try {
    // pdfjs detaches the buffer it is given
    return await getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
    }).promise;
  } catch (err) {
    const msg = String(err);
    if (msg.includes('password') || msg.includes('encrypted')) {
      throw new DocumentLoadError('Report is password-protected', err);
    }
    throw new DocumentLoadError(`Report could not be opened: ${msg}`, err);
  }
}

export async function readDrawingEvents(document: PdfDocumentLike): Promise<PageEvents[]> {
  const pages: PageEvents[] = [];

  for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
    let page: PdfPageLike;
    let list: PdfOperatorListLike;
    try {
      page = await document.getPage(pageNumber);
      list = await page.getOperatorList();
    } catch (err) {
      throw new DocumentLoadError(`Could not read page ${pageNumber}: ${String(err)}`, err);
    }

    pages.push({
      page: pageNumber,
      events: drawingEventsFromOperatorList(list, commonObjsFontResolver(page.commonObjs)),
    });
    page.cleanup();
  }

  return pages;
}

/** A report held in memory as PDF bytes. */
export function pdfReportSource(waterRightNo: WaterRightNo, bytes: Uint8Array): ReportSource {
  return {
    waterRightNo,
    async readPages() {
      const document = await loadReportDocument(bytes);
      try {
        return await readDrawingEvents(document);
      } finally {
        await document.destroy();
      }
    },
  };
}
