/**
 * Aggregate resource model: packages own types, types own configurations,
 * configurations own resources.
 */
import { configEquals } from './config-decoder.js';
import { DeviceConfig } from './types/device-config.js';
import { Resource } from './types/resource.js';

/**
 * Resources that apply under one device configuration.
 */
export class ResourceConfiguration {
  readonly resources: Resource[] = [];

  constructor(readonly config: DeviceConfig) {}

  /** Appends the other configuration's resources. */
  addAll(other: ResourceConfiguration): void {
    this.resources.push(...other.resources);
  }

  clone(): ResourceConfiguration {
    const copy = new ResourceConfiguration(this.config);
    copy.resources.push(...this.resources);
    return copy;
  }
}

/**
 * A resource type (string, drawable, array, ...) of a package.
 */
export class ResourceType {
  readonly configurations: ResourceConfiguration[] = [];

  constructor(readonly id: number, readonly name: string) {}

  /**
   * Gets the configuration holding exactly the given settings.
   */
  getConfiguration(config: DeviceConfig): ResourceConfiguration | null {
    return this.configurations.find((candidate: ResourceConfiguration) => configEquals(candidate.config, config)) ?? null;
  }

  getOrAddConfiguration(config: DeviceConfig): ResourceConfiguration {
    const existing: ResourceConfiguration | null = this.getConfiguration(config);
    if (existing) {
      return existing;
    }
    const created = new ResourceConfiguration(config);
    this.configurations.push(created);
    return created;
  }

  /**
   * Gets every resource of this type regardless of configuration. Resources
   * sharing a name are returned once, from the first configuration that has
   * one.
   */
  getAllResources(): Resource[] {
    const byName = new Map<string, Resource>();
    for (const configuration of this.configurations) {
      for (const resource of configuration.resources) {
        if (!byName.has(resource.resourceName)) {
          byName.set(resource.resourceName, resource);
        }
      }
    }
    return Array.from(byName.values());
  }

  getAllResourceNames(): Set<string> {
    const names = new Set<string>();
    for (const configuration of this.configurations) {
      for (const resource of configuration.resources) {
        names.add(resource.resourceName);
      }
    }
    return names;
  }

  /** Gets the resources with the given id across all configurations. */
  getAllResourcesById(resourceId: number): Resource[] {
    const id: number = resourceId >>> 0;
    return this.configurations.flatMap((configuration: ResourceConfiguration) =>
      configuration.resources.filter((resource: Resource) => resource.resourceId === id));
  }

  /**
   * Gets the first resource with the given id or name, scanning
   * configurations in order.
   */
  getFirstResource(idOrName: number | string): Resource | null {
    const matches = typeof idOrName === 'number'
      ? (resource: Resource): boolean => resource.resourceId === idOrName >>> 0
      : (resource: Resource): boolean => resource.resourceName === idOrName;
    for (const configuration of this.configurations) {
      const match: Resource | undefined = configuration.resources.find(matches);
      if (match) {
        return match;
      }
    }
    return null;
  }

  /**
   * Merges the other type's configurations into this one: equal
   * configurations are concatenated, others are appended as copies.
   */
  addAll(other: ResourceType): void {
    for (const configuration of other.configurations) {
      const existing: ResourceConfiguration | null = this.getConfiguration(configuration.config);
      if (existing) {
        existing.addAll(configuration);
      } else {
        this.configurations.push(configuration.clone());
      }
    }
  }

  clone(): ResourceType {
    const copy = new ResourceType(this.id, this.name);
    copy.configurations.push(...this.configurations.map((configuration: ResourceConfiguration) => configuration.clone()));
    return copy;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * A package of the resource table, identified by id and name.
 */
export class ResourcePackage {
  readonly types: ResourceType[] = [];

  constructor(readonly id: number, readonly name: string) {}

  /**
   * Gets the first type with the given name, e.g. "string".
   */
  getResourceType(typeName: string): ResourceType | null {
    return this.types.find((type: ResourceType) => type.name === typeName) ?? null;
  }

  getType(id: number, typeName: string): ResourceType | null {
    return this.types.find((type: ResourceType) => type.id === id && type.name === typeName) ?? null;
  }

  /** Gets the first type with the given id. */
  getTypeById(id: number): ResourceType | null {
    return this.types.find((type: ResourceType) => type.id === id) ?? null;
  }

  getOrAddType(id: number, typeName: string): ResourceType {
    const existing: ResourceType | null = this.getType(id, typeName);
    if (existing) {
      return existing;
    }
    const created = new ResourceType(id, typeName);
    this.types.push(created);
    return created;
  }

  /**
   * Merges the other package's types into this one by id and name.
   */
  addAll(other: ResourcePackage): void {
    for (const type of other.types) {
      const existing: ResourceType | null = this.getType(type.id, type.name);
      if (existing) {
        existing.addAll(type);
      } else {
        this.types.push(type.clone());
      }
    }
  }

  clone(): ResourcePackage {
    const copy = new ResourcePackage(this.id, this.name);
    copy.types.push(...this.types.map((type: ResourceType) => type.clone()));
    return copy;
  }
}
