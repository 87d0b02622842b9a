/** A Markdown document read from the documents directory. */
export interface LocalFile {
  filePath: string;
  /** Path relative to the scanned directory, with forward slashes. */
  relativePath: string;
  /** File name including its extension; used as the chunker's source name. */
  fileName: string;
  extension: string;
  content: string;
  modifiedAt: Date;
}
