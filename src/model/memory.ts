/**
 * In-memory live graph
 *
 * Builds the read-only element tree from a model dump, resolves uuid
 * references between elements, and serves the lookups of `LiveGraph`
 * from indexes built once at construction.
 */

import type {
  AttributeDefinitionClass,
  LiveAttributeDefinition,
  LiveAttributeValue,
  LiveContainer,
  LiveDataTypeDefinition,
  LiveEnumValue,
  LiveFolder,
  LiveGraph,
  LiveModule,
  LiveRequirement,
  LiveRequirementType,
  LiveTypesFolder,
  LiveWorkItem,
} from './types.js';
import type {
  AttributeDefinitionDump,
  AttributeValueDump,
  DataTypeDefinitionDump,
  FolderDump,
  ModelDump,
  ModuleDump,
  RequirementDump,
  RequirementTypeDump,
  TypesFolderDump,
} from './dump.js';
import { LoadError } from '../utils/load.js';

/**
 * Per-module lookup tables
 */
interface ModuleIndex {
  workItems: Map<string, LiveWorkItem>;
}

/**
 * Resolves uuid references while a dump is being built
 */
class DumpResolver {
  readonly dataTypes = new Map<string, LiveDataTypeDefinition>();
  readonly enumValues = new Map<string, LiveEnumValue>();
  readonly requirementTypes = new Map<string, LiveRequirementType>();
  readonly attributeDefinitions = new Map<string, LiveAttributeDefinition>();

  lookup<T>(table: Map<string, T>, uuid: string, what: string, path: string): T {
    const found = table.get(uuid);
    if (found === undefined) {
      throw new LoadError(`Unresolved ${what} reference at ${path}: ${uuid}`, 'INVALID_MODEL', {
        path,
        uuid,
      });
    }
    return found;
  }
}

/**
 * Live graph held in memory
 */
export class MemoryModel implements LiveGraph {
  readonly modules: readonly LiveModule[];
  private readonly byUuid = new Map<string, LiveModule>();
  private readonly byIdentifier = new Map<string, LiveModule>();
  private readonly indexes = new Map<LiveModule, ModuleIndex>();

  constructor(modules: readonly LiveModule[]) {
    this.modules = modules;
    for (const mod of modules) {
      this.byUuid.set(mod.uuid, mod);
      this.byIdentifier.set(mod.identifier, mod);
      this.indexes.set(mod, indexModule(mod));
    }
  }

  /**
   * Build a model from its plain-data form
   *
   * @throws LoadError if a reference in the dump cannot be resolved
   */
  static fromDump(dump: ModelDump): MemoryModel {
    return new MemoryModel(dump.modules.map((mod, i) => buildModule(mod, `modules[${i}]`)));
  }

  moduleByUuid(uuid: string): LiveModule | undefined {
    return this.byUuid.get(uuid);
  }

  moduleByIdentifier(identifier: string): LiveModule | undefined {
    return this.byIdentifier.get(identifier);
  }

  workItemByIdentifier(module: LiveModule, identifier: string): LiveWorkItem | undefined {
    return this.indexes.get(module)?.workItems.get(identifier);
  }

  typesFolder(module: LiveModule): LiveTypesFolder | undefined {
    return module.typesFolders[0];
  }

  dataTypeDefinitionByName(
    name: string,
    below: LiveTypesFolder | undefined
  ): LiveDataTypeDefinition | undefined {
    return below?.dataTypeDefinitions.find((dtdef) => dtdef.longName === name);
  }

  enumValueByName(
    dataTypeName: string,
    name: string,
    below: LiveTypesFolder | undefined
  ): LiveEnumValue | undefined {
    return this.dataTypeDefinitionByName(dataTypeName, below)?.values.find(
      (value) => value.longName === name
    );
  }

  requirementTypeByIdentifier(
    identifier: string,
    below: LiveTypesFolder | undefined
  ): LiveRequirementType | undefined {
    return below?.requirementTypes.find((reqtype) => reqtype.identifier === identifier);
  }

  attributeDefinitionByIdentifier(
    cls: AttributeDefinitionClass,
    identifier: string,
    below: LiveTypesFolder | undefined
  ): LiveAttributeDefinition | undefined {
    for (const reqtype of below?.requirementTypes ?? []) {
      const found = reqtype.attributeDefinitions.find(
        (adef) => adef.class === cls && adef.identifier === identifier
      );
      if (found) {
        return found;
      }
    }
    return undefined;
  }
}

// =============================================================================
// Indexing
// =============================================================================

function indexModule(mod: LiveModule): ModuleIndex {
  const workItems = new Map<string, LiveWorkItem>();
  const visit = (container: LiveContainer): void => {
    for (const req of container.requirements) {
      workItems.set(req.identifier, req);
    }
    for (const folder of container.folders) {
      workItems.set(folder.identifier, folder);
      visit(folder);
    }
  };
  visit(mod);
  return { workItems };
}

// =============================================================================
// Building
// =============================================================================

function buildDataType(
  dump: DataTypeDefinitionDump,
  resolver: DumpResolver
): LiveDataTypeDefinition {
  const values = dump.values.map((value) => {
    const live: LiveEnumValue = { uuid: value.uuid, longName: value.long_name };
    resolver.enumValues.set(live.uuid, live);
    return live;
  });
  const dtdef: LiveDataTypeDefinition = { uuid: dump.uuid, longName: dump.long_name, values };
  resolver.dataTypes.set(dtdef.uuid, dtdef);
  return dtdef;
}

function buildAttributeDefinition(
  dump: AttributeDefinitionDump,
  resolver: DumpResolver,
  path: string
): LiveAttributeDefinition {
  let adef: LiveAttributeDefinition;
  if (dump._type === 'AttributeDefinitionEnumeration') {
    adef = {
      class: dump._type,
      uuid: dump.uuid,
      identifier: dump.identifier,
      longName: dump.long_name,
      dataType:
        dump.data_type === undefined
          ? undefined
          : resolver.lookup(resolver.dataTypes, dump.data_type, 'data type', path),
      multiValued: dump.multi_valued ?? false,
    };
  } else {
    adef = {
      class: dump._type,
      uuid: dump.uuid,
      identifier: dump.identifier,
      longName: dump.long_name,
    };
  }
  resolver.attributeDefinitions.set(adef.uuid, adef);
  return adef;
}

function buildRequirementType(
  dump: RequirementTypeDump,
  resolver: DumpResolver,
  path: string
): LiveRequirementType {
  const reqtype: LiveRequirementType = {
    uuid: dump.uuid,
    identifier: dump.identifier,
    longName: dump.long_name,
    attributeDefinitions: dump.attribute_definitions.map((adef, i) =>
      buildAttributeDefinition(adef, resolver, `${path}.attribute_definitions[${i}]`)
    ),
  };
  resolver.requirementTypes.set(reqtype.uuid, reqtype);
  return reqtype;
}

function buildTypesFolder(
  dump: TypesFolderDump,
  resolver: DumpResolver,
  path: string
): LiveTypesFolder {
  return {
    uuid: dump.uuid,
    identifier: dump.identifier,
    longName: dump.long_name,
    dataTypeDefinitions: dump.data_type_definitions.map((dtdef) => buildDataType(dtdef, resolver)),
    requirementTypes: dump.requirement_types.map((reqtype, i) =>
      buildRequirementType(reqtype, resolver, `${path}.requirement_types[${i}]`)
    ),
  };
}

function buildAttributeValue(
  dump: AttributeValueDump,
  resolver: DumpResolver,
  path: string
): LiveAttributeValue {
  const definition =
    dump.definition === undefined
      ? undefined
      : resolver.lookup(resolver.attributeDefinitions, dump.definition, 'attribute definition', path);

  switch (dump._type) {
    case 'enum':
      return {
        uuid: dump.uuid,
        kind: 'Enum',
        definition,
        values: (dump.values ?? []).map((uuid) =>
          resolver.lookup(resolver.enumValues, uuid, 'enum value', path)
        ),
      };
    case 'string':
      return { uuid: dump.uuid, kind: 'String', definition, value: dump.value ?? null };
    case 'date':
      return { uuid: dump.uuid, kind: 'Date', definition, value: dump.value ?? null };
    case 'integer':
      return { uuid: dump.uuid, kind: 'Integer', definition, value: dump.value ?? null };
    case 'float':
      return { uuid: dump.uuid, kind: 'Float', definition, value: dump.value ?? null };
    case 'boolean':
      return { uuid: dump.uuid, kind: 'Boolean', definition, value: dump.value ?? null };
  }
}

function buildItemFields(
  dump: RequirementDump,
  resolver: DumpResolver,
  path: string
): Omit<LiveRequirement, 'kind' | 'parent'> {
  return {
    uuid: dump.uuid,
    identifier: dump.identifier,
    longName: dump.long_name,
    text: dump.text,
    type:
      dump.type === undefined
        ? undefined
        : resolver.lookup(resolver.requirementTypes, dump.type, 'requirement type', path),
    attributes: dump.attributes.map((attr, i) =>
      buildAttributeValue(attr, resolver, `${path}.attributes[${i}]`)
    ),
  };
}

function buildRequirement(
  dump: RequirementDump,
  parent: LiveContainer,
  resolver: DumpResolver,
  path: string
): LiveRequirement {
  return { ...buildItemFields(dump, resolver, path), kind: 'requirement', parent };
}

function buildFolder(
  dump: FolderDump,
  parent: LiveContainer,
  resolver: DumpResolver,
  path: string
): LiveFolder {
  const folders: LiveFolder[] = [];
  const requirements: LiveRequirement[] = [];
  const folder: LiveFolder = {
    ...buildItemFields(dump, resolver, path),
    kind: 'folder',
    parent,
    folders,
    requirements,
  };
  fillContainer(folder, dump, folders, requirements, resolver, path);
  return folder;
}

function fillContainer(
  container: LiveContainer,
  dump: { folders: FolderDump[]; requirements: RequirementDump[] },
  folders: LiveFolder[],
  requirements: LiveRequirement[],
  resolver: DumpResolver,
  path: string
): void {
  dump.folders.forEach((child, i) => {
    folders.push(buildFolder(child, container, resolver, `${path}.folders[${i}]`));
  });
  dump.requirements.forEach((child, i) => {
    requirements.push(buildRequirement(child, container, resolver, `${path}.requirements[${i}]`));
  });
}

function buildModule(dump: ModuleDump, path: string): LiveModule {
  const resolver = new DumpResolver();
  const typesFolders = dump.types_folders.map((folder, i) =>
    buildTypesFolder(folder, resolver, `${path}.types_folders[${i}]`)
  );

  const folders: LiveFolder[] = [];
  const requirements: LiveRequirement[] = [];
  const mod: LiveModule = {
    kind: 'module',
    uuid: dump.uuid,
    identifier: dump.identifier,
    longName: dump.long_name,
    typesFolders,
    folders,
    requirements,
  };
  fillContainer(mod, dump, folders, requirements, resolver, path);
  return mod;
}
