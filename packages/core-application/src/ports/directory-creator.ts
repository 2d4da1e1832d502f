export interface DirectoryCreator {
  /** Must succeed when the directory already exists. */
  mkdir(localAbsolutePath: string): Promise<void>;
}
