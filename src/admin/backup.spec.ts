import { expect } from "chai";

import { AdminError } from "../error";
import { FakeAdminService } from "../test/helpers/fakeAdminService";
import { Backup } from "./backup";
import { DatabaseAdminClient } from "./client";
import { BackupId, DatabaseId, InstanceId } from "./ids";

const INSTANCE = InstanceId.of("my-project", "my-instance");
const DATABASE = DatabaseId.of(INSTANCE, "test-db");
const BACKUP = BackupId.of(INSTANCE, "test-bck");
const EXPIRE_TIME = "2030-01-01T00:00:00Z";
const FAST = { initialRetryDelayMillis: 5, retryDelayMultiplier: 1, maxRetryDelayMillis: 5 };

describe("Backup", () => {
  let service: FakeAdminService;
  let client: DatabaseAdminClient;

  beforeEach(async () => {
    service = new FakeAdminService();
    service.addInstance(INSTANCE);
    client = new DatabaseAdminClient({
      projectId: "my-project",
      transport: service,
      polling: { createDatabase: FAST, createBackup: FAST, restoreDatabase: FAST },
    });
    await (await client.createDatabase("my-instance", "test-db")).awaitResult();
  });

  it("should convert the server's size to a number", () => {
    const backup = Backup.fromResource(client, {
      name: BACKUP.name,
      database: DATABASE.name,
      sizeBytes: "2048",
      state: "READY",
      referencingDatabases: [`${INSTANCE.name}/databases/restored-test-db`],
    });

    expect(backup.sizeBytes).to.equal(2048);
    expect(backup.isReady()).to.be.true;
    expect(backup.referencingDatabases).to.deep.equal([
      `${INSTANCE.name}/databases/restored-test-db`,
    ]);
  });

  describe("create", () => {
    it("should create the backup it describes", async () => {
      const handle = await client
        .newBackup(BACKUP, { database: DATABASE, expireTime: new Date(EXPIRE_TIME) })
        .create();

      const backup = await handle.awaitResult();

      expect(backup.equals(client.newBackup(BACKUP))).to.be.true;
      expect(backup.expireTime).to.equal("2030-01-01T00:00:00.000Z");
      expect(backup.createTime).to.be.a("string");
    });

    it("should refuse to start without a source database", async () => {
      await expect(client.newBackup(BACKUP, { expireTime: EXPIRE_TIME }).create())
        .to.be.rejectedWith(AdminError, "Backup test-bck has no source database")
        .and.eventually.have.property("code", "INVALID_ARGUMENT");
    });

    it("should refuse to start without an expire time", async () => {
      await expect(client.newBackup(BACKUP, { database: DATABASE }).create()).to.be.rejectedWith(
        AdminError,
        "Backup test-bck has no expire time",
      );
      expect(service.callsTo("CreateBackup")).to.be.empty;
    });
  });

  describe("on the server", () => {
    let backup: Backup;

    beforeEach(async () => {
      backup = await (
        await client.createBackup("my-instance", "test-bck", "test-db", EXPIRE_TIME)
      ).awaitResult();
    });

    it("should reload its state", async () => {
      const reloaded = await client.newBackup(BACKUP).reload();

      expect(reloaded.state).to.equal("READY");
      expect(reloaded.sizeBytes).to.equal(1024);
      expect(await reloaded.exists()).to.be.true;
    });

    it("should push a new expire time", async () => {
      const updated = await backup.updateExpireTime(new Date("2031-01-01T00:00:00Z"));

      expect(updated.expireTime).to.equal("2031-01-01T00:00:00.000Z");
      expect((await backup.reload()).expireTime).to.equal("2031-01-01T00:00:00.000Z");
    });

    it("should push its own expire time when given none", async () => {
      await backup.updateExpireTime();

      expect(service.callsTo("UpdateBackup")[0].request).to.deep.equal({
        backup: { name: BACKUP.name, expireTime: EXPIRE_TIME },
        updateMask: ["expire_time"],
      });
    });

    it("should refuse to update without any expire time", async () => {
      await expect(client.newBackup(BACKUP).updateExpireTime()).to.be.rejectedWith(
        AdminError,
        "Backup test-bck has no expire time",
      );
    });

    it("should delete itself", async () => {
      await backup.delete();

      expect(await backup.exists()).to.be.false;
      await expect(backup.delete())
        .to.be.rejectedWith(AdminError)
        .and.eventually.have.property("code", "NOT_FOUND");
    });

    it("should restore into a new database", async () => {
      const target = DatabaseId.of(INSTANCE, "restored-test-db");

      const restored = await (await backup.restore(target)).awaitResult();

      expect(restored.id.equals(target)).to.be.true;
      expect(restored.restoredFrom).to.equal(BACKUP.name);
    });

    it("should scope operation listings to itself", async () => {
      const filter = "(name:backups/test-bck) AND (done:true)";
      service.addFilterMatches(filter);

      const operations = await backup.listBackupOperations({ filter: "done:true" }).all();

      expect(operations).to.be.empty;
      expect(service.callsTo("ListBackupOperations")[0].request).to.deep.equal({
        parent: INSTANCE.name,
        filter,
        pageSize: undefined,
      });
    });
  });
});
