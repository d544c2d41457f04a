export interface DatasetFile {
  fileName: string;
  stem: string;
  filePath: string;
}
