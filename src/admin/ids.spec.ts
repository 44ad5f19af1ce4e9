import { expect } from "chai";

import { AdminError, MalformedIdentifierError } from "../error";
import { BackupId, DatabaseId, InstanceId, validateBackupId, validateDatabaseId } from "./ids";

const INSTANCE_NAME = "projects/my-project/instances/my-instance";

describe("ids", () => {
  describe("InstanceId", () => {
    it("should render the canonical name", () => {
      expect(InstanceId.of("my-project", "my-instance").name).to.equal(INSTANCE_NAME);
    });

    it("should parse what it renders", () => {
      const id = InstanceId.parse(INSTANCE_NAME);

      expect(id).to.include({ project: "my-project", instance: "my-instance" });
      expect(id.equals(InstanceId.of("my-project", "my-instance"))).to.be.true;
      expect(`${id}`).to.equal(INSTANCE_NAME);
    });

    it("should reject names with the wrong shape", () => {
      expect(() => InstanceId.parse("projects/my-project")).to.throw(
        MalformedIdentifierError,
        'Malformed instance name "projects/my-project": expected projects/{project}/instances/{instance}',
      );
      expect(() => InstanceId.parse("projects/my-project/zones/my-instance")).to.throw(
        MalformedIdentifierError,
      );
    });

    it("should reject empty components", () => {
      expect(() => InstanceId.of("", "my-instance")).to.throw(
        MalformedIdentifierError,
        'Malformed instance id "": project must not be empty',
      );
    });

    it("should be immutable", () => {
      expect(Object.isFrozen(InstanceId.of("my-project", "my-instance"))).to.be.true;
    });
  });

  describe("DatabaseId", () => {
    const NAME = `${INSTANCE_NAME}/databases/test-db`;

    it("should be built from an instance or from its parts", () => {
      const instance = InstanceId.of("my-project", "my-instance");

      expect(DatabaseId.of(instance, "test-db").name).to.equal(NAME);
      expect(DatabaseId.of("my-project", "my-instance", "test-db").name).to.equal(NAME);
    });

    it("should round-trip through its name", () => {
      const id = DatabaseId.parse(NAME);

      expect(id).to.include({ project: "my-project", instance: "my-instance", database: "test-db" });
      expect(id.name).to.equal(NAME);
      expect(id.instanceId().name).to.equal(INSTANCE_NAME);
    });

    it("should compare by value", () => {
      expect(DatabaseId.parse(NAME).equals(DatabaseId.of("my-project", "my-instance", "test-db")))
        .to.be.true;
      expect(DatabaseId.parse(NAME).equals(DatabaseId.of("my-project", "my-instance", "other")))
        .to.be.false;
    });

    it("should reject malformed names", () => {
      expect(() => DatabaseId.parse(`${INSTANCE_NAME}/backups/test-db`)).to.throw(
        MalformedIdentifierError,
        "expected projects/{project}/instances/{instance}/databases/{database}",
      );
      expect(() => DatabaseId.parse(`${INSTANCE_NAME}/databases/test-db/extra`)).to.throw(
        MalformedIdentifierError,
      );
      expect(() => DatabaseId.parse("projects//instances/my-instance/databases/test-db")).to.throw(
        MalformedIdentifierError,
        'empty segment after "projects"',
      );
    });

    it("should reject components containing a slash", () => {
      expect(() => DatabaseId.of("my-project", "my-instance", "a/b")).to.throw(
        MalformedIdentifierError,
        'Malformed database id "a/b": database must not contain "/"',
      );
    });
  });

  describe("BackupId", () => {
    const NAME = `${INSTANCE_NAME}/backups/test-bck`;

    it("should round-trip through its name", () => {
      const id = BackupId.parse(NAME);

      expect(id).to.include({ project: "my-project", instance: "my-instance", backup: "test-bck" });
      expect(id.name).to.equal(NAME);
      expect(id.equals(BackupId.of(InstanceId.parse(INSTANCE_NAME), "test-bck"))).to.be.true;
    });

    it("should reject database names", () => {
      expect(() => BackupId.parse(`${INSTANCE_NAME}/databases/test-bck`)).to.throw(
        MalformedIdentifierError,
        "expected projects/{project}/instances/{instance}/backups/{backup}",
      );
    });
  });

  describe("validateDatabaseId", () => {
    it("should accept valid ids", () => {
      expect(() => validateDatabaseId("test-db")).not.to.throw();
      expect(() => validateDatabaseId("a_1")).not.to.throw();
    });

    it("should reject ids of the wrong length", () => {
      expect(() => validateDatabaseId("a")).to.throw(
        AdminError,
        'Invalid database id "a": must be between 2 and 30 characters.',
      );
      expect(() => validateDatabaseId("a".repeat(31))).to.throw(AdminError);
    });

    it("should reject ids with invalid characters", () => {
      for (const id of ["Test-db", "1db", "db-", "test.db"]) {
        expect(() => validateDatabaseId(id), id)
          .to.throw(AdminError, /must start with a lowercase letter/)
          .with.property("code", "INVALID_ARGUMENT");
      }
    });
  });

  describe("validateBackupId", () => {
    it("should allow longer ids than databases", () => {
      expect(() => validateBackupId("b".repeat(60))).not.to.throw();
      expect(() => validateBackupId("b".repeat(61))).to.throw(
        AdminError,
        "must be between 2 and 60 characters.",
      );
    });
  });
});
