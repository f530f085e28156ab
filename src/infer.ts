import { Database, EntityId } from "./database.js";
import { AtdfError, isAtdfError } from "./errors.js";
import { Log, Reporter, scopedLog, silentReporter } from "./reporter.js";
import { bitsNeeded } from "./util.js";

// Passes over a fully loaded database. They only revise attributes of
// existing entities and must run after every document has been ingested.

function nameOf(db: Database, id: EntityId): string {
  return db.attrs.name.get(id) ?? "<unknown>";
}

function reportFailure(log: Log, what: string, err: unknown): void {
  if (!isAtdfError(err)) throw err;
  log.warn(`${what}: ${err.message}`, { code: err.code });
}

/**
 * Moves the lowest register offset of a single-instance peripheral type onto
 * its instance, so the type's registers start at zero. Register groups in
 * some devices sit at offset 0 with registers at absolute addresses; after
 * this pass equivalent types from different devices line up.
 */
export function inferPeripheralOffsets(db: Database, reporter: Reporter = silentReporter): void {
  const log = scopedLog(reporter, "infer");
  const usage = new Map<EntityId, { count: number; instance: EntityId }>();
  for (const [instance, type] of db.instanceLinks("instance.peripheral")) {
    const entry = usage.get(type);
    if (entry) entry.count += 1;
    else usage.set(type, { count: 1, instance });
  }

  for (const [type, { count, instance }] of usage) {
    if (count !== 1) {
      log.debug(`'${nameOf(db, type)}' has ${count} instances, keeping its register offsets`);
      continue;
    }
    try {
      inferPeripheralOffset(db, type, instance);
    } catch (err) {
      reportFailure(log, `failed to infer offset of peripheral instance '${nameOf(db, instance)}'`, err);
    }
  }
}

/**
 * Returns the amount moved from the registers to the instance. Clusters
 * placed directly in the type move by the same amount so their addresses
 * stay put.
 */
export function inferPeripheralOffset(db: Database, typeId: EntityId, instanceId: EntityId): number {
  const registers = db.childrenOf("type.register", typeId).filter((id) => db.attrs.offset.has(id));
  if (registers.length === 0) {
    throw new AtdfError("structural", "NoRegisters", "{type} has no registers", { type: nameOf(db, typeId) });
  }
  const offsets = registers.map((id) => db.attrs.offset.get(id) ?? 0);
  const min = Math.min(...offsets);

  db.reviseOffset(instanceId, (db.attrs.offset.get(instanceId) ?? 0) + min);
  registers.forEach((id, i) => db.reviseOffset(id, offsets[i] - min));
  for (const cluster of db.childrenOf("type.register_group", typeId)) {
    const offset = db.attrs.offset.get(cluster);
    if (offset !== undefined) db.reviseOffset(cluster, offset - min);
  }
  return min;
}

export function inferEnumSizes(db: Database, reporter: Reporter = silentReporter): void {
  const log = scopedLog(reporter, "infer");
  for (const enumId of db.entities("type.enum")) {
    try {
      inferEnumSize(db, enumId);
    } catch (err) {
      reportFailure(log, `failed to infer size of enum '${nameOf(db, enumId)}'`, err);
    }
  }
}

/**
 * An enum takes the size of the fields that use it, which must agree and be
 * wide enough for its largest value. An unused enum gets the smallest size
 * that holds its largest value.
 */
export function inferEnumSize(db: Database, enumId: EntityId): number {
  const fields = db.childrenOf("type.enum_field", enumId);
  if (fields.length === 0) {
    throw new AtdfError("structural", "MissingEnumFields", "enum {name} has no values", { name: nameOf(db, enumId) });
  }
  const maxValue = Math.max(...fields.map((id) => db.attrs.value.get(id) ?? 0));

  const fieldSizes: number[] = [];
  for (const [fieldId, referenced] of db.attrs.enum) {
    if (referenced !== enumId) continue;
    const size = db.attrs.size.get(fieldId);
    if (size !== undefined) fieldSizes.push(size);
  }

  let size = bitsNeeded(maxValue);
  if (fieldSizes.length > 0) {
    const first = fieldSizes[0];
    if (fieldSizes.some((s) => s !== first)) {
      throw new AtdfError("consistency", "InconsistentEnumSizes", "fields using enum {name} differ in size: {sizes}", {
        name: nameOf(db, enumId),
        sizes: fieldSizes,
      });
    }
    if (bitsNeeded(maxValue) > first) {
      throw new AtdfError("consistency", "EnumMaxValueTooBig", "enum {name} has value {max} which does not fit {size} bits", {
        name: nameOf(db, enumId),
        max: maxValue,
        size: first,
      });
    }
    size = first;
  }
  db.reviseSize(enumId, size);
  return size;
}
