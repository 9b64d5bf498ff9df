export * from "./ExifService";
export * from "./ExifServiceExifTool";
export * from "./ExifTagHelper";
