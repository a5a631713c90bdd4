export * from "./FileHandleReadable";
export * from "./RotatingFileWritable";
