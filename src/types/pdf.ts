// Minimal pdfjs surface used by the reader. PDFDocumentProxy and PDFPageProxy
// satisfy these, and tests can hand in plain objects.

export interface PdfOperatorListLike {
  fnArray: ArrayLike<number>;
  argsArray: ArrayLike<unknown>;
}

export interface PdfObjectStoreLike {
  has(objId: string): boolean;
  get(objId: string): unknown;
}

export interface PdfPageLike {
  commonObjs: PdfObjectStoreLike;
  getOperatorList(): Promise<PdfOperatorListLike>;
  cleanup(): unknown;
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
}
