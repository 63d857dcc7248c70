export * from "./Exif";
export * from "./ExifService";
export { ExifServiceExifTool } from "./ExifServiceExifTool";
