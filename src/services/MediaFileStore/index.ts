export * from "./MediaFileStore";
export * from "./MediaFileStoreFs";
