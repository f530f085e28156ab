export { accessFromString, archFromString, decomposeMask, loadAtdf, loadIntoDb } from "./atdf.js";
export type { FieldSlice, LoadOptions } from "./atdf.js";
export { defaultConfig, loadConfig, loadOptionsFrom, mergeConfig, parseConfig } from "./config.js";
export type { Config } from "./config.js";
export { categories, Database, instanceCategories, typeCategories } from "./database.js";
export type {
  Access,
  Arch,
  AttributeName,
  AttributeView,
  Category,
  EntityId,
  InstanceCategory,
  RelationKind,
  TypeCategory,
} from "./database.js";
export { AtdfError, isAtdfError } from "./errors.js";
export type { ErrorKind } from "./errors.js";
export { inferEnumSize, inferEnumSizes, inferPeripheralOffset, inferPeripheralOffsets } from "./infer.js";
export {
  CallbackReporter,
  CollectingReporter,
  ConsoleReporter,
  formatDiagnostic,
  scopedLog,
  silentReporter,
} from "./reporter.js";
export type { Diagnostic, Log, Reporter, Severity } from "./reporter.js";
export { summarizeDatabase } from "./summary.js";
export type { DatabaseSummary } from "./summary.js";
export { XmlDoc, XmlNode } from "./xml_doc.js";
