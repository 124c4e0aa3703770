import pdfParse from "pdf-parse";

export async function extractPdfText(buffer: Buffer): Promise<string> {
  const result = await pdfParse(buffer);
  // Page breaks come through as form feeds.
  return result.text.replace(/\f/g, "\n").trim();
}
