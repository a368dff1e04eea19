export { ByteCursor, type IntWidth } from "./ByteCursor.ts";
export { BufferSource, FileSource, type ByteSource } from "./ByteSource.ts";
export * from "./constants.ts";
export { DataDirectory, readDataDirectories } from "./DataDirectory.ts";
export { DOSHeader, MIN_LFANEW } from "./DOSHeader.ts";
export { rvaToOffset, sectionForRva } from "./helpers.ts";
export { HTMLOutput } from "./HTMLOutput.ts";
export { JsonOutput, formatJson, type JsonObject, type JsonValue } from "./JsonOutput.ts";
export { NotEnoughBytesError } from "./NotEnoughBytesError.ts";
export {
  CoffOptionalHeader,
  WindowsOptionalHeader,
  readOptionalHeader,
  type OptionalHeader,
  type StandardFields,
  type WindowsFields,
} from "./OptionalHeader.ts";
export { formatText, type FieldArgs, type FieldKind, type Output } from "./Output.ts";
export { PEFile } from "./PEFile.ts";
export { PEFormatError } from "./PEFormatError.ts";
export { PEHeader } from "./PEHeader.ts";
export {
  ResourceDataEntry,
  ResourceDirectory,
  ResourceDirectoryEntry,
  type ResourceKey,
  type ResourcePayload,
} from "./ResourceDirectory.ts";
export {
  DirectorySink,
  MemorySink,
  extractResources,
  resourceOutputName,
  safeFileName,
  type ResourceSink,
} from "./ResourceExtractor.ts";
export {
  ResourceManager,
  resourceLanguageLabel,
  resourceNameLabel,
  resourceTypeName,
  type Resource,
} from "./ResourceManager.ts";
export { SectionHeader } from "./SectionHeader.ts";
export { TextOutput } from "./TextOutput.ts";
