export * from "./SidecarReader";
export * from "./SidecarReaderXmp";
export { parseXmp } from "./XmpDocument";
