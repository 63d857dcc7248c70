export * from "./FileSystemScanner";
export { FileSystemScannerDefault } from "./FileSystemScannerDefault";
