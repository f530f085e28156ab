import { categories, Category, Database, EntityId } from "./database.js";

export type PeripheralSummary = {
  name: string;
  type: string;
  offset?: number;
};

export type InterruptSummary = {
  name: string;
  index: number;
};

export type DeviceSummary = {
  name: string;
  arch: string;
  properties: Record<string, string>;
  peripherals: PeripheralSummary[];
  interrupts: InterruptSummary[];
};

export type EnumSummary = {
  name: string;
  size?: number;
  values: number;
};

export type PeripheralTypeSummary = {
  name: string;
  registers: number;
  registerGroups: string[];
  enums: EnumSummary[];
};

export type DatabaseSummary = {
  counts: Partial<Record<Category, number>>;
  devices: DeviceSummary[];
  peripheralTypes: PeripheralTypeSummary[];
};

function nameOf(db: Database, id: EntityId): string {
  return db.attrs.name.get(id) ?? `#${id}`;
}

function summarizeDevice(db: Database, id: EntityId): DeviceSummary {
  const peripherals = db.childrenOf("instance.peripheral", id).map((p) => {
    const type = db.instanceType(p);
    const out: PeripheralSummary = { name: nameOf(db, p), type: type === undefined ? "" : nameOf(db, type) };
    const offset = db.attrs.offset.get(p);
    if (offset !== undefined) out.offset = offset;
    return out;
  });
  const interrupts = db
    .childrenOf("instance.interrupt", id)
    .map((i) => ({ name: nameOf(db, i), index: db.attrs.index.get(i) ?? 0 }))
    .sort((a, b) => a.index - b.index || a.name.localeCompare(b.name));
  return {
    name: nameOf(db, id),
    arch: db.attrs.arch.get(id) ?? "unknown",
    properties: Object.fromEntries(db.attrs.properties.get(id) ?? []),
    peripherals,
    interrupts,
  };
}

function summarizePeripheralType(db: Database, id: EntityId): PeripheralTypeSummary {
  const groups = db.childrenOf("type.register_group", id);
  const registers =
    db.childrenOf("type.register", id).length +
    groups.reduce((n, g) => n + db.childrenOf("type.register", g).length, 0);
  return {
    name: nameOf(db, id),
    registers,
    registerGroups: groups.map((g) => nameOf(db, g)),
    enums: db.childrenOf("type.enum", id).map((e) => {
      const out: EnumSummary = { name: nameOf(db, e), values: db.childrenOf("type.enum_field", e).length };
      const size = db.attrs.size.get(e);
      if (size !== undefined) out.size = size;
      return out;
    }),
  };
}

/** What a loaded database holds, for the CLI and for quick inspection. */
export function summarizeDatabase(db: Database): DatabaseSummary {
  const counts: Partial<Record<Category, number>> = {};
  for (const c of categories) counts[c] = db.count(c);
  return {
    counts,
    devices: db.entities("instance.device").map((d) => summarizeDevice(db, d)),
    peripheralTypes: db.entities("type.peripheral").map((p) => summarizePeripheralType(db, p)),
  };
}

export function formatCounts(summary: DatabaseSummary): string {
  const c = summary.counts;
  return [
    `devices=${c["instance.device"] ?? 0}`,
    `peripherals=${c["type.peripheral"] ?? 0}`,
    `registers=${c["type.register"] ?? 0}`,
    `fields=${c["type.field"] ?? 0}`,
    `enums=${c["type.enum"] ?? 0}`,
    `interrupts=${c["instance.interrupt"] ?? 0}`,
  ].join(" ");
}
