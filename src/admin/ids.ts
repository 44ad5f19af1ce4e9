import { AdminError, MalformedIdentifierError } from "../error";

const DATABASE_ID_PATTERN = /^[a-z][a-z0-9_\-]*[a-z0-9]$/;
const DATABASE_ID_LENGTH = { min: 2, max: 30 };
const BACKUP_ID_LENGTH = { min: 2, max: 60 };

function checkComponent(kind: string, field: string, value: string): void {
  if (!value) {
    throw new MalformedIdentifierError(kind, value, `${field} must not be empty`);
  }
  if (value.includes("/")) {
    throw new MalformedIdentifierError(kind, value, `${field} must not contain "/"`);
  }
}

/**
 * Splits `name` into the values that follow each keyword, e.g.
 * `projects/p/instances/i` with ["projects", "instances"] yields ["p", "i"].
 */
function splitName(kind: string, name: string, keywords: string[]): string[] {
  const expected = keywords.map((k) => `${k}/{${k.replace(/s$/, "")}}`).join("/");
  const segments = name.split("/");
  if (segments.length !== keywords.length * 2) {
    throw new MalformedIdentifierError(kind, name, `expected ${expected}`);
  }
  return keywords.map((keyword, i) => {
    const literal = segments[i * 2];
    const value = segments[i * 2 + 1];
    if (literal !== keyword) {
      throw new MalformedIdentifierError(kind, name, `expected ${expected}`);
    }
    if (!value) {
      throw new MalformedIdentifierError(kind, name, `empty segment after "${keyword}"`);
    }
    return value;
  });
}

export class InstanceId {
  private constructor(
    readonly project: string,
    readonly instance: string,
  ) {
    Object.freeze(this);
  }

  static of(project: string, instance: string): InstanceId {
    checkComponent("instance id", "project", project);
    checkComponent("instance id", "instance", instance);
    return new InstanceId(project, instance);
  }

  static parse(name: string): InstanceId {
    const [project, instance] = splitName("instance name", name, ["projects", "instances"]);
    return new InstanceId(project, instance);
  }

  get name(): string {
    return `projects/${this.project}/instances/${this.instance}`;
  }

  equals(other: InstanceId): boolean {
    return this.project === other.project && this.instance === other.instance;
  }

  toString(): string {
    return this.name;
  }
}

export class DatabaseId {
  private constructor(
    readonly project: string,
    readonly instance: string,
    readonly database: string,
  ) {
    Object.freeze(this);
  }

  static of(instance: InstanceId, database: string): DatabaseId;
  static of(project: string, instance: string, database: string): DatabaseId;
  static of(first: InstanceId | string, second: string, third?: string): DatabaseId {
    const [project, instance, database] =
      first instanceof InstanceId
        ? [first.project, first.instance, second]
        : [first, second, third ?? ""];
    checkComponent("database id", "project", project);
    checkComponent("database id", "instance", instance);
    checkComponent("database id", "database", database);
    return new DatabaseId(project, instance, database);
  }

  static parse(name: string): DatabaseId {
    const [project, instance, database] = splitName("database name", name, [
      "projects",
      "instances",
      "databases",
    ]);
    return new DatabaseId(project, instance, database);
  }

  get name(): string {
    return `${this.instanceId().name}/databases/${this.database}`;
  }

  instanceId(): InstanceId {
    return InstanceId.of(this.project, this.instance);
  }

  equals(other: DatabaseId): boolean {
    return (
      this.project === other.project &&
      this.instance === other.instance &&
      this.database === other.database
    );
  }

  toString(): string {
    return this.name;
  }
}

export class BackupId {
  private constructor(
    readonly project: string,
    readonly instance: string,
    readonly backup: string,
  ) {
    Object.freeze(this);
  }

  static of(instance: InstanceId, backup: string): BackupId;
  static of(project: string, instance: string, backup: string): BackupId;
  static of(first: InstanceId | string, second: string, third?: string): BackupId {
    const [project, instance, backup] =
      first instanceof InstanceId
        ? [first.project, first.instance, second]
        : [first, second, third ?? ""];
    checkComponent("backup id", "project", project);
    checkComponent("backup id", "instance", instance);
    checkComponent("backup id", "backup", backup);
    return new BackupId(project, instance, backup);
  }

  static parse(name: string): BackupId {
    const [project, instance, backup] = splitName("backup name", name, [
      "projects",
      "instances",
      "backups",
    ]);
    return new BackupId(project, instance, backup);
  }

  get name(): string {
    return `${this.instanceId().name}/backups/${this.backup}`;
  }

  instanceId(): InstanceId {
    return InstanceId.of(this.project, this.instance);
  }

  equals(other: BackupId): boolean {
    return (
      this.project === other.project &&
      this.instance === other.instance &&
      this.backup === other.backup
    );
  }

  toString(): string {
    return this.name;
  }
}

function checkResourceId(kind: string, id: string, length: { min: number; max: number }): void {
  if (id.length < length.min || id.length > length.max) {
    throw new AdminError(
      `Invalid ${kind} id "${id}": must be between ${length.min} and ${length.max} characters.`,
      { code: "INVALID_ARGUMENT" },
    );
  }
  if (!DATABASE_ID_PATTERN.test(id)) {
    throw new AdminError(
      `Invalid ${kind} id "${id}": must start with a lowercase letter, end with a letter or ` +
        `digit and contain only lowercase letters, digits, "_" and "-".`,
      { code: "INVALID_ARGUMENT" },
    );
  }
}

/**
 * Checks a database id against the service's naming rules.
 */
export function validateDatabaseId(id: string): void {
  checkResourceId("database", id, DATABASE_ID_LENGTH);
}

/**
 * Checks a backup id against the service's naming rules.
 */
export function validateBackupId(id: string): void {
  checkResourceId("backup", id, BACKUP_ID_LENGTH);
}
