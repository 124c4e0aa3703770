import { Logger } from "../config/logger";
import { DocumentError } from "../shared/errors";
import { extractDocxText } from "./extractors/docx.extractor";
import { extractPdfText } from "./extractors/pdf.extractor";

export type DocumentType = "pdf" | "docx" | "txt" | "unknown";

type SupportedType = Exclude<DocumentType, "unknown">;

const TYPE_RULES: ReadonlyArray<{ type: SupportedType; extension: string; mime: (mime: string) => boolean }> = [
  { type: "pdf", extension: ".pdf", mime: (mime) => mime.includes("pdf") },
  {
    type: "docx",
    extension: ".docx",
    mime: (mime) => mime.includes("application/vnd.openxmlformats-officedocument.wordprocessingml.document"),
  },
  { type: "txt", extension: ".txt", mime: (mime) => mime.startsWith("text/plain") },
];

const EXTRACTORS: Record<SupportedType, (buffer: Buffer) => Promise<string>> = {
  pdf: extractPdfText,
  docx: extractDocxText,
  txt: async (buffer) => buffer.toString("utf8").replace(/^\uFEFF/, "").trim(),
};

export class DocumentService {
  constructor(private readonly logger: Logger) {}

  detectDocumentType(fileName?: string, mimeType?: string): DocumentType {
    const name = (fileName ?? "").toLowerCase();
    const mime = (mimeType ?? "").toLowerCase();
    const rule = TYPE_RULES.find((candidate) => candidate.mime(mime) || name.endsWith(candidate.extension));
    return rule ? rule.type : "unknown";
  }

  isSupported(fileName?: string, mimeType?: string): boolean {
    return this.detectDocumentType(fileName, mimeType) !== "unknown";
  }

  /** Extracted text keeps paragraph breaks; runs of spaces and blank lines are collapsed. */
  async extractText(buffer: Buffer, fileName?: string, mimeType?: string): Promise<string> {
    const type = this.detectDocumentType(fileName, mimeType);
    if (type === "unknown") {
      throw new DocumentError("Unsupported document type. Please provide PDF, DOCX or TXT.");
    }

    const text = (await EXTRACTORS[type](buffer))
      .replace(/\u0000/g, "")
      .replace(/[ \t]+/g, " ")
      .replace(/\n{3,}/g, "\n\n")
      .trim();

    this.logger.info("Document text extracted", { type, fileName, mimeType, chars: text.length });

    if (!text) {
      throw new DocumentError(`Could not extract text from document${fileName ? ` ${fileName}` : ""}.`);
    }
    return text;
  }
}
