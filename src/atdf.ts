import { Access, Arch, Database, EntityId } from "./database.js";
import { AtdfError, isAtdfError, missingAttribute } from "./errors.js";
import { inferEnumSizes, inferPeripheralOffsets } from "./infer.js";
import { Log, Reporter, Severity, scopedLog, silentReporter } from "./reporter.js";
import { parseBigInteger, parseInteger } from "./util.js";
import { XmlDoc, XmlNode } from "./xml_doc.js";

export type LoadOptions = {
  reporter?: Reporter;
  warnUnknownAttributes?: boolean;
  inferPeripheralOffsets?: boolean;
  inferEnumSizes?: boolean;
};

type InterruptGroupEntry = {
  name: string;
  index: number;
  description?: string;
};

type Interrupt = InterruptGroupEntry;

// Attributes each element is known to carry. Anything else is reported but
// does not stop the element from loading.
const allowedAttrs = {
  device: ["architecture", "name", "family", "series"],
  moduleType: ["oldname", "name", "id", "version", "caption", "name2"],
  registerGroup: ["name", "caption", "aligned", "section", "size"],
  nestedRegisterGroup: ["name", "modes", "size", "name-in-module", "caption", "count", "start-index", "offset"],
  mode: ["value", "mask", "name", "qualifier", "caption"],
  register: [
    "rw",
    "name",
    "access-size",
    "modes",
    "initval",
    "size",
    "access",
    "mask",
    "bit-addressable",
    "atomic-op",
    "ocd-rw",
    "caption",
    "count",
    "offset",
  ],
  bitfield: ["caption", "lsb", "mask", "modes", "name", "rw", "value", "values"],
  valueGroup: ["name", "caption"],
  value: ["name", "caption", "value"],
  moduleInterruptGroup: ["name", "caption"],
  moduleInterrupt: ["name", "index", "caption"],
  instance: ["oldname", "name", "caption"],
  instanceRegisterGroup: ["name", "address-space", "version", "size", "name-in-module", "caption", "id", "offset"],
  signal: ["group", "index", "pad", "function", "field", "ioset"],
  interrupt: [
    "index",
    "name",
    "irq-caption",
    "alternate-name",
    "irq-index",
    "caption",
    "module-instance",
    "irq-name",
    "alternate-caption",
  ],
  interruptGroup: ["module-instance", "name-in-module", "index"],
} satisfies Record<string, readonly string[]>;

const archNames: Record<string, Arch> = {
  "ARM926EJ-S": "arm926ej_s",
  AVR8: "avr8",
  AVR8L: "avr8l",
  AVR8X: "avr8x",
  AVR8_XMEGA: "avr8xmega",
  "CORTEX-A5": "cortex_a5",
  "CORTEX-A7": "cortex_a7",
  "CORTEX-M0PLUS": "cortex_m0plus",
  "CORTEX-M23": "cortex_m23",
  "CORTEX-M4": "cortex_m4",
  "CORTEX-M7": "cortex_m7",
  MIPS: "mips",
};

export function archFromString(str: string): Arch {
  return Object.hasOwn(archNames, str) ? archNames[str] : "unknown";
}

export function accessFromString(str: string): Access | "read-write" | undefined {
  if (str === "RW") return "read-write";
  if (str === "R") return "read-only";
  if (str === "W") return "write-only";
  return undefined;
}

export type FieldSlice = {
  name: string;
  offset: number;
  width: number;
};

/**
 * Splits a bitfield mask into fields. A contiguous mask is one field; any
 * other mask becomes one single-bit field per set bit, lowest bit first,
 * named `<name>_bit<k>`.
 */
export function decomposeMask(name: string, mask: bigint): { contiguous: boolean; slices: FieldSlice[] } {
  if (mask <= 0n) {
    throw new AtdfError("parse", "EmptyMask", "bitfield {name} has no bits set in its mask", { name });
  }
  const bits = mask.toString(2);
  const bitLength = bits.length;
  const offset = bitLength - 1 - bits.lastIndexOf("1");
  const width = bits.split("").filter((b) => b === "1").length;
  if (width === bitLength - offset) {
    return { contiguous: true, slices: [{ name, offset, width }] };
  }
  const slices: FieldSlice[] = [];
  for (let i = offset; i < bitLength; i++) {
    if (((mask >> BigInt(i)) & 1n) === 1n) {
      slices.push({ name: `${name}_bit${slices.length}`, offset: i, width: 1 });
    }
  }
  return { contiguous: false, slices };
}

class LoadContext {
  // interrupt-group templates by name, only valid while one document loads
  readonly interruptGroups = new Map<string, InterruptGroupEntry[]>();

  constructor(
    readonly db: Database,
    readonly log: Log,
    readonly warnUnknownAttributes: boolean,
  ) {}
}

function required(node: XmlNode, key: string, code: string): string {
  const v = node.getAttribute(key);
  if (v === undefined) throw missingAttribute(node.name, key, code);
  return v;
}

function validateAttrs(ctx: LoadContext, node: XmlNode, allowed: readonly string[]): void {
  if (!ctx.warnUnknownAttributes) return;
  for (const { key } of node.attributes()) {
    if (allowed.includes(key)) continue;
    ctx.log.warn(
      `the '${key}' attribute isn't usually found in the '${node.name}' element, this could mean unhandled ATDF behaviour or your input is malformed`,
      { line: node.line, element: node.name, attribute: key, code: "UnknownAttribute" },
    );
  }
}

/** Reports a failed element and carries on; anything but a loader error is rethrown. */
function recover(ctx: LoadContext, node: XmlNode, what: string, err: unknown, severity: Severity = "warn"): void {
  if (!isAtdfError(err) || err.kind === "invariant") throw err;
  ctx.log[severity](`${what}: ${err.message}`, { line: node.line, element: node.name, code: err.code });
}

function setDescription(db: Database, id: EntityId, node: XmlNode): void {
  const caption = node.getAttribute("caption");
  if (caption !== undefined) db.setDescription(id, caption);
}

function applyAccess(db: Database, id: EntityId, node: XmlNode): void {
  const rw = node.getAttribute("rw");
  if (rw === undefined) return;
  const access = accessFromString(rw);
  if (access === "read-only" || access === "write-only") db.setAccess(id, access);
}

/**
 * The most common layout: a single register group named after its owner. Its
 * contents then belong to the owner directly.
 */
function getInlinedRegisterGroup(node: XmlNode, ownerName: string): XmlNode | undefined {
  const groups = node.children("register-group");
  if (groups.length !== 1) return undefined;
  return groups[0].getAttribute("name") === ownerName ? groups[0] : undefined;
}

export function loadIntoDb(db: Database, doc: XmlDoc, options: LoadOptions = {}): void {
  const reporter = options.reporter ?? silentReporter;
  const ctx = new LoadContext(db, scopedLog(reporter, "atdf"), options.warnUnknownAttributes ?? true);
  const root = doc.root();

  for (const node of root.iterate(["modules"], "module")) {
    try {
      loadModuleType(ctx, node);
    } catch (err) {
      recover(ctx, node, "failed to load module type", err, "error");
    }
  }

  for (const node of root.iterate(["devices"], "device")) {
    try {
      loadDevice(ctx, node);
    } catch (err) {
      recover(ctx, node, "failed to load device", err, "error");
    }
  }

  if (options.inferPeripheralOffsets ?? true) inferPeripheralOffsets(db, reporter);
  if (options.inferEnumSizes ?? true) inferEnumSizes(db, reporter);

  db.assertValid();
}

export function loadAtdf(text: string, options: LoadOptions = {}): Database {
  const db = new Database();
  loadIntoDb(db, XmlDoc.fromText(text), options);
  return db;
}

function loadModuleType(ctx: LoadContext, node: XmlNode): void {
  validateAttrs(ctx, node, allowedAttrs.moduleType);
  const db = ctx.db;
  const name = required(node, "name", "ModuleTypeMissingName");
  const id = db.build("type.peripheral", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
  });
  ctx.log.debug(`${id}: created peripheral type '${name}'`);

  for (const child of node.children("value-group")) {
    try {
      loadEnum(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `failed to load enum of '${name}'`, err);
    }
  }

  for (const child of node.children("interrupt-group")) {
    try {
      loadModuleInterruptGroup(ctx, child);
    } catch (err) {
      recover(ctx, child, `failed to load interrupt group of '${name}'`, err);
    }
  }

  // instances repeat this check in loadModuleInstance()
  const inlined = getInlinedRegisterGroup(node, name);
  if (inlined) {
    validateAttrs(ctx, inlined, allowedAttrs.registerGroup);
    loadRegisterGroupChildren(ctx, inlined, id);
    return;
  }
  for (const child of node.children("register-group")) {
    try {
      loadRegisterGroup(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `failed to load register group of '${name}'`, err);
    }
  }
}

function loadModuleInterruptGroup(ctx: LoadContext, node: XmlNode): void {
  validateAttrs(ctx, node, allowedAttrs.moduleInterruptGroup);
  const name = required(node, "name", "MissingInterruptGroupName");
  const entries: InterruptGroupEntry[] = [];
  ctx.interruptGroups.set(name, entries);

  for (const child of node.children("interrupt")) {
    try {
      validateAttrs(ctx, child, allowedAttrs.moduleInterrupt);
      entries.push({
        name: required(child, "name", "MissingInterruptName"),
        index: parseInteger(required(child, "index", "MissingInterruptIndex"), true),
        description: child.getAttribute("caption"),
      });
    } catch (err) {
      recover(ctx, child, `failed to load interrupt of group '${name}'`, err);
    }
  }
}

function loadRegisterGroupChildren(ctx: LoadContext, node: XmlNode, destId: EntityId): void {
  for (const child of node.children("mode")) {
    try {
      loadMode(ctx, child, destId);
    } catch (err) {
      recover(ctx, child, `${destId}: failed to load mode`, err);
    }
  }

  for (const child of node.children("register")) {
    try {
      loadRegister(ctx, child, destId);
    } catch (err) {
      recover(ctx, child, `${destId}: failed to load register`, err);
    }
  }
}

// Register groups sit under a peripheral type or, as clusters, under another
// register group.
function loadRegisterGroup(ctx: LoadContext, node: XmlNode, parentId: EntityId): void {
  const db = ctx.db;
  const nested = db.is("type.register_group", parentId);
  validateAttrs(ctx, node, nested ? allowedAttrs.nestedRegisterGroup : allowedAttrs.registerGroup);
  const name = required(node, "name", "MissingRegisterGroupName");
  const id = db.build("type.register_group", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
    const size = node.getAttribute("size");
    if (size !== undefined) db.setSize(id, parseInteger(size) * 8);
    const offset = node.getAttribute("offset");
    if (nested && offset !== undefined) db.setOffset(id, parseInteger(offset));
    db.addChild("type.register_group", parentId, id);
  });
  ctx.log.debug(`${id}: created register group '${name}'`);
  const nameInModule = node.getAttribute("name-in-module");
  if (nested && nameInModule !== undefined) {
    const count = node.getAttribute("count");
    ctx.log.debug(
      `${id}: register group '${name}' refers to '${nameInModule}'${count === undefined ? "" : ` x${count}`}, the reference is not followed`,
      { line: node.line, element: node.name, attribute: "name-in-module", code: "UnresolvedRegisterGroupReference" },
    );
  }
  loadRegisterGroupChildren(ctx, node, id);

  for (const child of node.children("register-group")) {
    try {
      loadRegisterGroup(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `failed to load register group of '${name}'`, err);
    }
  }
}

function loadMode(ctx: LoadContext, node: XmlNode, parentId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.mode);
  const db = ctx.db;
  const name = required(node, "name", "MissingModeName");
  const value = required(node, "value", "MissingModeValue");
  const qualifier = required(node, "qualifier", "MissingModeQualifier");
  db.build("type.mode", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
    db.setModeDetails(id, value, qualifier);
    db.addChild("type.mode", parentId, id);
  });
}

// Mode names resolve against the modes the parent owns; one unknown name
// drops the whole assignment.
function assignModes(ctx: LoadContext, node: XmlNode, id: EntityId, parentId: EntityId, label: string): void {
  const modeNames = node.getAttribute("modes");
  if (modeNames === undefined) return;
  const db = ctx.db;
  const available = db.childrenOf("type.mode", parentId);
  const resolved: EntityId[] = [];
  for (const token of modeNames.split(" ").filter((t) => t.length > 0)) {
    const mode = available.find((m) => db.attrs.name.get(m) === token);
    if (mode === undefined) {
      ctx.log.warn(`failed to find mode '${token}' for '${label}'`, {
        line: node.line,
        element: node.name,
        code: "MissingMode",
      });
      return;
    }
    resolved.push(mode);
  }
  for (const mode of resolved) db.addMode(id, mode);
}

function loadRegister(ctx: LoadContext, node: XmlNode, parentId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.register);
  const db = ctx.db;
  const name = required(node, "name", "MissingRegisterName");
  const id = db.build("type.register", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
    // ATDF sizes are in bytes
    db.setSize(id, parseInteger(required(node, "size", "MissingRegisterSize")) * 8);
    db.setOffset(id, parseInteger(required(node, "offset", "MissingRegisterOffset")));
    const initval = node.getAttribute("initval");
    if (initval !== undefined) db.setResetValue(id, parseBigInteger(initval));
    applyAccess(db, id, node);
    db.addChild("type.register", parentId, id);
  });

  assignModes(ctx, node, id, parentId, name);

  for (const child of node.children("mode")) {
    try {
      loadMode(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `${id}: failed to load mode`, err);
    }
  }

  for (const child of node.children("bitfield")) {
    try {
      loadField(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `failed to load bitfield of '${name}'`, err);
    }
  }
}

function loadField(ctx: LoadContext, node: XmlNode, registerId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.bitfield);
  const db = ctx.db;
  const name = required(node, "name", "MissingFieldName");
  const mask = parseBigInteger(required(node, "mask", "MissingFieldMask"));
  const { contiguous, slices } = decomposeMask(name, mask);

  for (const slice of slices) {
    const id = db.build("type.field", (id) => {
      db.setName(id, slice.name);
      setDescription(db, id, node);
      db.setOffset(id, slice.offset);
      db.setSize(id, slice.width);
      applyAccess(db, id, node);
      db.addChild("type.field", registerId, id);
    });
    assignModes(ctx, node, id, registerId, slice.name);
    // split fields never carry an enum
    if (contiguous) linkEnum(ctx, node, id);
  }
}

// Only enums loaded before this field are candidates.
function linkEnum(ctx: LoadContext, node: XmlNode, fieldId: EntityId): void {
  const values = node.getAttribute("values");
  if (values === undefined) return;
  const enumId = ctx.db.findByName("type.enum", values);
  if (enumId === undefined) {
    ctx.log.debug(`${fieldId}: failed to find enum '${values}'`, {
      line: node.line,
      element: node.name,
      code: "UnresolvedEnum",
    });
    return;
  }
  ctx.db.setEnum(fieldId, enumId);
  ctx.log.debug(`${fieldId}: assigned enum '${values}'`);
}

function loadEnum(ctx: LoadContext, node: XmlNode, peripheralId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.valueGroup);
  const db = ctx.db;
  const name = required(node, "name", "MissingEnumName");
  const id = db.build("type.enum", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
    db.addChild("type.enum", peripheralId, id);
  });

  for (const child of node.children("value")) {
    try {
      loadEnumField(ctx, child, id);
    } catch (err) {
      recover(ctx, child, `failed to load value of enum '${name}'`, err);
    }
  }
}

function loadEnumField(ctx: LoadContext, node: XmlNode, enumId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.value);
  const db = ctx.db;
  const name = required(node, "name", "MissingEnumFieldName");
  const value = parseInteger(required(node, "value", "MissingEnumFieldValue"));
  db.build("type.enum_field", (id) => {
    db.setName(id, name);
    db.setValue(id, value);
    setDescription(db, id, node);
    db.addChild("type.enum_field", enumId, id);
  });
}

function loadDevice(ctx: LoadContext, node: XmlNode): void {
  validateAttrs(ctx, node, allowedAttrs.device);
  const db = ctx.db;
  const name = required(node, "name", "NoDeviceName");
  const arch = required(node, "architecture", "NoDeviceArch");
  const family = required(node, "family", "NoDeviceFamily");
  const series = node.getAttribute("series");
  const id = db.build("instance.device", (id) => {
    db.setName(id, name);
    db.setArch(id, archFromString(arch));
    db.addProperty(id, "arch", arch);
    db.addProperty(id, "family", family);
    if (series !== undefined) db.addProperty(id, "series", series);
  });

  for (const child of node.iterate(["peripherals"], "module")) {
    try {
      loadModuleInstances(ctx, child, id);
    } catch (err) {
      recover(ctx, child, "failed to instantiate module", err);
    }
  }

  const interrupts = node.findChild("interrupts");
  if (interrupts) loadInterrupts(ctx, interrupts, id);
}

function loadModuleInstances(ctx: LoadContext, node: XmlNode, deviceId: EntityId): void {
  const moduleName = required(node, "name", "MissingModuleName");
  const typeId = ctx.db.findByName("type.peripheral", moduleName);
  if (typeId === undefined) {
    throw new AtdfError("lookup", "MissingPeripheralType", "failed to find the {name} peripheral type", {
      name: moduleName,
    });
  }

  for (const child of node.children("instance")) {
    try {
      loadModuleInstance(ctx, child, deviceId, typeId);
    } catch (err) {
      recover(ctx, child, `failed to instantiate '${moduleName}'`, err);
    }
  }
}

function loadModuleInstance(ctx: LoadContext, node: XmlNode, deviceId: EntityId, typeId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.instance);
  const name = required(node, "name", "MissingInstanceName");
  for (const signal of node.iterate(["signals"], "signal")) {
    validateAttrs(ctx, signal, allowedAttrs.signal);
  }

  // register groups never carry an offset inside a module, so they act as
  // variants of the peripheral rather than as nested clusters
  if (ctx.db.hasChildren("type.register_group", typeId)) {
    loadModuleInstanceFromRegisterGroup(ctx, node, name, deviceId, typeId);
  } else {
    loadModuleInstanceFromPeripheral(ctx, node, name, deviceId, typeId);
  }
}

function createPeripheralInstance(
  ctx: LoadContext,
  node: XmlNode,
  name: string,
  offset: number,
  deviceId: EntityId,
  typeId: EntityId,
): void {
  const db = ctx.db;
  const id = db.build("instance.peripheral", (id) => {
    db.setName(id, name);
    setDescription(db, id, node);
    db.setOffset(id, offset);
    db.linkInstance(id, typeId);
    db.addChild("instance.peripheral", deviceId, id);
  });
  ctx.log.debug(`${id}: created peripheral instance '${name}'`);
}

function loadModuleInstanceFromPeripheral(
  ctx: LoadContext,
  node: XmlNode,
  name: string,
  deviceId: EntityId,
  typeId: EntityId,
): void {
  const group = getInlinedRegisterGroup(node, name);
  if (!group) {
    throw new AtdfError(
      "structural",
      "InstanceNotInlined",
      "{name} instantiates a peripheral without register groups but does not have a single register-group named after itself",
      { name },
    );
  }
  validateAttrs(ctx, group, allowedAttrs.instanceRegisterGroup);
  const offset = parseInteger(required(group, "offset", "MissingPeripheralOffset"));
  createPeripheralInstance(ctx, node, name, offset, deviceId, typeId);
}

function loadModuleInstanceFromRegisterGroup(
  ctx: LoadContext,
  node: XmlNode,
  name: string,
  deviceId: EntityId,
  typeId: EntityId,
): void {
  const db = ctx.db;
  const groups = node.children("register-group");
  if (groups.length === 0) {
    throw new AtdfError("structural", "MissingInstanceRegisterGroup", "instance {name} has no register-group", {
      name,
    });
  }
  if (groups.length > 1) {
    // TODO: instances spanning several register groups need register-group instances
    throw new AtdfError(
      "structural",
      "InstanceWithMultipleRegisterGroups",
      "instance {name} has {count} register-groups, only one is supported",
      { name, count: groups.length },
    );
  }
  const group = groups[0];
  validateAttrs(ctx, group, allowedAttrs.instanceRegisterGroup);
  const nameInModule = required(group, "name-in-module", "MissingNameInModule");
  const groupType = db
    .childrenOf("type.register_group", typeId)
    .find((id) => db.attrs.name.get(id) === nameInModule);
  if (groupType === undefined) {
    throw new AtdfError("lookup", "MissingRegisterGroup", "no register group {group} for instance {name}", {
      group: nameInModule,
      name,
    });
  }
  const offset = parseInteger(required(group, "offset", "MissingOffset"));
  createPeripheralInstance(ctx, node, name, offset, deviceId, groupType);
}

function loadInterrupts(ctx: LoadContext, node: XmlNode, deviceId: EntityId): void {
  for (const child of node.children("interrupt")) {
    try {
      loadInterrupt(ctx, child, deviceId);
    } catch (err) {
      recover(ctx, child, "failed to load interrupt", err);
    }
  }

  for (const child of node.children("interrupt-group")) {
    try {
      loadInterruptGroup(ctx, child, deviceId);
    } catch (err) {
      recover(ctx, child, "failed to expand interrupt group", err);
    }
  }
}

function createInterrupt(db: Database, deviceId: EntityId, interrupt: Interrupt): void {
  db.build("instance.interrupt", (id) => {
    db.setName(id, interrupt.name);
    db.setIndex(id, interrupt.index);
    if (interrupt.description !== undefined) db.setDescription(id, interrupt.description);
    db.addChild("instance.interrupt", deviceId, id);
  });
}

function loadInterrupt(ctx: LoadContext, node: XmlNode, deviceId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.interrupt);
  const name = required(node, "name", "MissingInterruptName");
  const index = parseInteger(required(node, "index", "MissingInterruptIndex"), true);
  const moduleInstance = node.getAttribute("module-instance");
  createInterrupt(ctx.db, deviceId, {
    name: moduleInstance === undefined ? name : `${moduleInstance}_${name}`,
    index,
    description: node.getAttribute("caption"),
  });
}

function loadInterruptGroup(ctx: LoadContext, node: XmlNode, deviceId: EntityId): void {
  validateAttrs(ctx, node, allowedAttrs.interruptGroup);
  const moduleInstance = required(node, "module-instance", "MissingModuleInstance");
  const nameInModule = required(node, "name-in-module", "MissingNameInModule");
  const index = parseInteger(required(node, "index", "MissingInterruptGroupIndex"), true);
  const entries = ctx.interruptGroups.get(nameInModule);
  if (!entries) {
    throw new AtdfError("lookup", "MissingInterruptGroup", "no interrupt group named {name}", {
      name: nameInModule,
    });
  }
  for (const entry of entries) {
    createInterrupt(ctx.db, deviceId, {
      name: `${moduleInstance}_${entry.name}`,
      index: entry.index + index,
      description: entry.description,
    });
  }
}
