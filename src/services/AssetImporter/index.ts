export * from "./AssetImporter";
export * from "./AssetImporterDump";
