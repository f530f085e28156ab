import { AtdfError } from "./errors.js";

export type EntityId = number;

export const typeCategories = [
  "type.peripheral",
  "type.register_group",
  "type.register",
  "type.field",
  "type.enum",
  "type.enum_field",
  "type.mode",
] as const;

export const instanceCategories = [
  "instance.device",
  "instance.peripheral",
  "instance.register_group",
  "instance.interrupt",
] as const;

export type TypeCategory = (typeof typeCategories)[number];
export type InstanceCategory = (typeof instanceCategories)[number];
export type Category = TypeCategory | InstanceCategory;

/** Children are grouped under the category of the child. */
export type RelationKind = Category;

export const categories: readonly Category[] = [...typeCategories, ...instanceCategories];

// categories that never sit below another entity
const rootCategories: ReadonlySet<Category> = new Set<Category>(["type.peripheral", "instance.device"]);

// instance category -> type categories it may be linked to
const linkTargets: Partial<Record<Category, readonly Category[]>> = {
  "instance.peripheral": ["type.peripheral", "type.register_group"],
  "instance.register_group": ["type.register_group"],
};

export type Access = "read-only" | "write-only";

export type Arch =
  | "arm926ej_s"
  | "avr8"
  | "avr8l"
  | "avr8x"
  | "avr8xmega"
  | "cortex_a5"
  | "cortex_a7"
  | "cortex_m0plus"
  | "cortex_m23"
  | "cortex_m4"
  | "cortex_m7"
  | "mips"
  | "unknown";

type Attributes = {
  name: Map<EntityId, string>;
  description: Map<EntityId, string>;
  offset: Map<EntityId, number>;
  size: Map<EntityId, number>;
  access: Map<EntityId, Access>;
  resetValue: Map<EntityId, bigint>;
  enum: Map<EntityId, EntityId>;
  modes: Map<EntityId, Set<EntityId>>;
  value: Map<EntityId, number>;
  index: Map<EntityId, number>;
  modeValue: Map<EntityId, string>;
  qualifier: Map<EntityId, string>;
  arch: Map<EntityId, Arch>;
  properties: Map<EntityId, Map<string, string>>;
};

export type AttributeName = keyof Attributes;

export type AttributeView = {
  readonly [K in AttributeName]: Attributes[K] extends Map<EntityId, infer V> ? ReadonlyMap<EntityId, V> : never;
};

function invariant(code: string, format: string, variables: Record<string, unknown>): AtdfError {
  return new AtdfError("invariant", code, format, variables);
}

/**
 * Entity graph for one or more device files. Entities are bare integers; what
 * an entity is comes from the category it is tagged with and the sparse
 * attribute maps that mention it.
 */
export class Database {
  private nextId = 0;
  private readonly live = new Set<EntityId>();
  private readonly tags = new Map<Category, Set<EntityId>>(
    categories.map((c): [Category, Set<EntityId>] => [c, new Set()]),
  );
  private readonly tagOf = new Map<EntityId, Category>();
  private readonly store: Attributes = {
    name: new Map(),
    description: new Map(),
    offset: new Map(),
    size: new Map(),
    access: new Map(),
    resetValue: new Map(),
    enum: new Map(),
    modes: new Map(),
    value: new Map(),
    index: new Map(),
    modeValue: new Map(),
    qualifier: new Map(),
    arch: new Map(),
    properties: new Map(),
  };
  private readonly children = new Map<RelationKind, Map<EntityId, Set<EntityId>>>();
  private readonly parents = new Map<EntityId, Set<EntityId>>();
  private readonly links = new Map<EntityId, EntityId>();

  get attrs(): AttributeView {
    return this.store;
  }

  createEntity(): EntityId {
    const id = this.nextId++;
    this.live.add(id);
    return id;
  }

  exists(id: EntityId): boolean {
    return this.live.has(id);
  }

  tag(id: EntityId, category: Category): void {
    this.requireLive(id);
    const current = this.tagOf.get(id);
    if (current !== undefined) {
      throw invariant("AlreadyTagged", "entity {id} is already a {current}, cannot tag it {category}", {
        id,
        current,
        category,
      });
    }
    this.tagOf.set(id, category);
    this.entitySet(category).add(id);
  }

  /**
   * Creates an entity of `category` and hands it to `construct`. If construction
   * throws, the entity is destroyed and the error rethrown; `construct` should
   * only attach the entity to a parent once every required attribute is set.
   */
  build(category: Category, construct: (id: EntityId) => void): EntityId {
    const id = this.createEntity();
    this.tag(id, category);
    try {
      construct(id);
    } catch (err) {
      this.destroy(id);
      throw err;
    }
    return id;
  }

  is(category: Category, id: EntityId): boolean {
    return this.entitySet(category).has(id);
  }

  categoryOf(id: EntityId): Category | undefined {
    return this.tagOf.get(id);
  }

  entities(category: Category): EntityId[] {
    return Array.from(this.entitySet(category));
  }

  count(category: Category): number {
    return this.entitySet(category).size;
  }

  setName(id: EntityId, name: string): void {
    this.setOnce(this.store.name, "name", id, name);
  }

  setDescription(id: EntityId, description: string): void {
    this.setOnce(this.store.description, "description", id, description);
  }

  setOffset(id: EntityId, offset: number): void {
    this.setOnce(this.store.offset, "offset", id, offset);
  }

  setSize(id: EntityId, size: number): void {
    this.setOnce(this.store.size, "size", id, size);
  }

  setResetValue(id: EntityId, value: bigint): void {
    this.setOnce(this.store.resetValue, "resetValue", id, value);
  }

  setAccess(id: EntityId, access: Access): void {
    this.setOnce(this.store.access, "access", id, access);
  }

  setValue(id: EntityId, value: number): void {
    this.setOnce(this.store.value, "value", id, value);
  }

  setIndex(id: EntityId, index: number): void {
    this.setOnce(this.store.index, "index", id, index);
  }

  setArch(id: EntityId, arch: Arch): void {
    this.setOnce(this.store.arch, "arch", id, arch);
  }

  setModeDetails(id: EntityId, value: string, qualifier: string): void {
    this.setOnce(this.store.modeValue, "modeValue", id, value);
    this.setOnce(this.store.qualifier, "qualifier", id, qualifier);
  }

  addProperty(id: EntityId, key: string, value: string): void {
    this.requireLive(id);
    let props = this.store.properties.get(id);
    if (!props) {
      props = new Map();
      this.store.properties.set(id, props);
    }
    props.set(key, value);
  }

  setEnum(fieldId: EntityId, enumId: EntityId): void {
    this.requireLive(enumId);
    this.setOnce(this.store.enum, "enum", fieldId, enumId);
  }

  addMode(id: EntityId, modeId: EntityId): void {
    this.requireLive(id);
    this.requireLive(modeId);
    let modes = this.store.modes.get(id);
    if (!modes) {
      modes = new Set();
      this.store.modes.set(id, modes);
    }
    modes.add(modeId);
  }

  /** Offset normalization moves offsets between instances and registers. */
  reviseOffset(id: EntityId, offset: number): void {
    this.requireLive(id);
    this.store.offset.set(id, offset);
  }

  /** Enum size inference owns the size of enum types. */
  reviseSize(id: EntityId, size: number): void {
    this.requireLive(id);
    this.store.size.set(id, size);
  }

  addChild(kind: RelationKind, parent: EntityId, child: EntityId): void {
    this.requireLive(parent);
    this.requireLive(child);
    if (!this.is(kind, child)) {
      throw invariant("RelationKindMismatch", "entity {child} cannot be a {kind} child", { child, kind });
    }
    let byParent = this.children.get(kind);
    if (!byParent) {
      byParent = new Map();
      this.children.set(kind, byParent);
    }
    let set = byParent.get(parent);
    if (!set) {
      set = new Set();
      byParent.set(parent, set);
    }
    set.add(child);
    let owners = this.parents.get(child);
    if (!owners) {
      owners = new Set();
      this.parents.set(child, owners);
    }
    owners.add(parent);
  }

  childrenOf(kind: RelationKind, parent: EntityId): EntityId[] {
    return Array.from(this.children.get(kind)?.get(parent) ?? []);
  }

  hasChildren(kind: RelationKind, parent: EntityId): boolean {
    return (this.children.get(kind)?.get(parent)?.size ?? 0) > 0;
  }

  parentOf(child: EntityId): EntityId | undefined {
    const owners = this.parents.get(child);
    return owners ? owners.values().next().value : undefined;
  }

  linkInstance(instance: EntityId, type: EntityId): void {
    this.requireLive(instance);
    this.requireLive(type);
    if (this.links.has(instance)) {
      throw invariant("AlreadyLinked", "instance {instance} is already linked to a type", { instance });
    }
    this.links.set(instance, type);
  }

  instanceType(instance: EntityId): EntityId | undefined {
    return this.links.get(instance);
  }

  /** `[instance, type]` pairs for every instance of `category`, in creation order. */
  instanceLinks(category: InstanceCategory): Array<[EntityId, EntityId]> {
    const out: Array<[EntityId, EntityId]> = [];
    for (const [instance, type] of this.links) {
      if (this.is(category, instance)) out.push([instance, type]);
    }
    return out;
  }

  findByName(category: Category, name: string): EntityId | undefined {
    for (const id of this.entitySet(category)) {
      if (this.store.name.get(id) === name) return id;
    }
    return undefined;
  }

  getByName(category: Category, name: string): EntityId {
    const id = this.findByName(category, name);
    if (id === undefined) {
      throw new AtdfError("lookup", "NameNotFound", "no {category} named {name}", { category, name });
    }
    return id;
  }

  /**
   * Removes every trace of `id`. Meant for rolling back an entity that no
   * other entity refers to yet.
   */
  destroy(id: EntityId): void {
    this.live.delete(id);
    const category = this.tagOf.get(id);
    if (category !== undefined) {
      this.entitySet(category).delete(id);
      this.tagOf.delete(id);
    }
    for (const map of Object.values(this.store)) map.delete(id);
    for (const modes of this.store.modes.values()) modes.delete(id);
    for (const [field, enumId] of Array.from(this.store.enum)) {
      if (enumId === id) this.store.enum.delete(field);
    }
    for (const byParent of this.children.values()) {
      const owned = byParent.get(id);
      if (owned) {
        for (const child of owned) this.parents.get(child)?.delete(id);
        byParent.delete(id);
      }
      for (const set of byParent.values()) set.delete(id);
    }
    this.parents.delete(id);
    this.links.delete(id);
    for (const [instance, type] of Array.from(this.links)) {
      if (type === id) this.links.delete(instance);
    }
  }

  /** Every referential-integrity problem in the graph, empty when it is sound. */
  validate(): string[] {
    const problems: string[] = [];
    const label = (id: EntityId) => {
      const name = this.store.name.get(id);
      return name === undefined ? `#${id}` : `#${id} (${name})`;
    };

    for (const id of this.live) {
      const category = this.tagOf.get(id);
      if (category === undefined) {
        problems.push(`${label(id)} has no category`);
        continue;
      }
      if (!this.store.name.has(id)) problems.push(`${category} ${label(id)} has no name`);
      if (!rootCategories.has(category)) {
        const owners = this.parents.get(id)?.size ?? 0;
        if (owners !== 1) problems.push(`${category} ${label(id)} has ${owners} parents`);
      }
    }

    for (const [kind, byParent] of this.children) {
      for (const [parent, set] of byParent) {
        if (!this.live.has(parent)) problems.push(`${kind} relation from missing parent #${parent}`);
        for (const child of set) {
          if (!this.live.has(child)) problems.push(`${kind} relation to missing child #${child}`);
          else if (!this.is(kind, child)) problems.push(`${label(child)} is related as ${kind} but is not one`);
        }
      }
    }

    for (const [instance, type] of this.links) {
      const category = this.tagOf.get(instance);
      const allowed = category === undefined ? undefined : linkTargets[category];
      if (!this.live.has(instance) || !allowed) {
        problems.push(`instance link from invalid entity #${instance}`);
        continue;
      }
      const target = this.tagOf.get(type);
      if (!this.live.has(type) || target === undefined || !allowed.includes(target)) {
        problems.push(`${label(instance)} is linked to invalid type #${type}`);
      }
    }
    for (const id of this.entitySet("instance.peripheral")) {
      if (!this.links.has(id)) problems.push(`instance.peripheral ${label(id)} is not linked to a type`);
    }

    for (const [field, enumId] of this.store.enum) {
      if (!this.is("type.field", field)) problems.push(`enum reference from non-field ${label(field)}`);
      if (!this.is("type.enum", enumId)) problems.push(`${label(field)} refers to missing enum #${enumId}`);
    }
    for (const [id, modes] of this.store.modes) {
      for (const mode of modes) {
        if (!this.is("type.mode", mode)) problems.push(`${label(id)} refers to missing mode #${mode}`);
      }
    }

    for (const [attr, map] of Object.entries(this.store)) {
      for (const id of map.keys()) {
        if (!this.live.has(id)) problems.push(`${attr} attribute set on missing entity #${id}`);
      }
    }
    return problems;
  }

  assertValid(): void {
    const problems = this.validate();
    if (problems.length > 0) {
      throw invariant("InvalidDatabase", "database failed validation: {problems}", { problems });
    }
  }

  private entitySet(category: Category): Set<EntityId> {
    let set = this.tags.get(category);
    if (!set) {
      set = new Set();
      this.tags.set(category, set);
    }
    return set;
  }

  private requireLive(id: EntityId): void {
    if (!this.live.has(id)) {
      throw invariant("MissingEntity", "entity {id} does not exist", { id });
    }
  }

  private setOnce<V>(map: Map<EntityId, V>, attr: AttributeName, id: EntityId, value: V): void {
    this.requireLive(id);
    if (map.has(id)) {
      throw invariant("AttributeAlreadySet", "{attr} of entity {id} is already set", { attr, id });
    }
    map.set(id, value);
  }
}
