export { DEFAULT_OPTIONS, mergeOptions, parseByteSize, validateOptions } from "./defaults";
