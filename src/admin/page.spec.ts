import { expect } from "chai";
import * as sinon from "sinon";

import { InvalidMetadataTypeError } from "../error";
import { typeUrl } from "./metadata";
import { OperationEntry, PageFetcher, PagedList, combineFilters } from "./page";
import { PageResult } from "./transport";

function fetcherOf(pages: string[][]): sinon.SinonStub<[string?], Promise<PageResult<string>>> {
  const fetcher = sinon.stub<[string?], Promise<PageResult<string>>>();
  pages.forEach((items, i) => {
    const token = i === 0 ? undefined : `page-${i}`;
    const nextPageToken = i + 1 < pages.length ? `page-${i + 1}` : undefined;
    fetcher.withArgs(token).resolves({ items, nextPageToken });
  });
  return fetcher;
}

describe("PagedList", () => {
  it("should not fetch anything until asked", () => {
    const fetcher = fetcherOf([["a"]]);

    new PagedList<string>(fetcher);

    expect(fetcher).not.to.have.been.called;
  });

  it("should walk the pages in order", async () => {
    const fetcher = fetcherOf([["a", "b"], ["c"], ["d"]]);
    const list = new PagedList<string>(fetcher);

    const first = await list.firstPage();
    expect(first.values).to.deep.equal(["a", "b"]);
    expect(first.hasNextPage()).to.be.true;

    const second = await first.nextPage();
    expect(second?.values).to.deep.equal(["c"]);

    const third = await second?.nextPage();
    expect(third?.values).to.deep.equal(["d"]);
    expect(third?.hasNextPage()).to.be.false;
    expect(await third?.nextPage()).to.be.undefined;
  });

  it("should iterate over every item of every page", async () => {
    const list = new PagedList<string>(fetcherOf([["a", "b"], [], ["c"]]));

    const seen: string[] = [];
    for await (const item of list) {
      seen.push(item);
    }

    expect(seen).to.deep.equal(["a", "b", "c"]);
  });

  it("should start again from the first page on each iteration", async () => {
    const fetcher = fetcherOf([["a"], ["b"]]);
    const list = new PagedList<string>(fetcher);

    expect(await list.all()).to.deep.equal(["a", "b"]);
    expect(await list.all()).to.deep.equal(["a", "b"]);
    expect(fetcher.getCalls().map((c) => c.args[0])).to.deep.equal([
      undefined,
      "page-1",
      undefined,
      "page-1",
    ]);
  });

  it("should stop fetching when the caller stops iterating", async () => {
    const fetcher = fetcherOf([["a", "b"], ["c"]]);
    const list = new PagedList<string>(fetcher);

    for await (const item of list.iterateAll()) {
      expect(item).to.equal("a");
      break;
    }

    expect(fetcher).to.have.been.calledOnce;
  });

  it("should propagate fetch errors", async () => {
    const fetcher: PageFetcher<string> = () => Promise.reject(new Error("boom"));

    await expect(new PagedList(fetcher).all()).to.be.rejectedWith("boom");
  });
});

describe("OperationEntry", () => {
  const NAME = "projects/my-project/instances/my-instance/backups/test-bck/operations/op_1";

  it("should expose the operation's state", () => {
    const entry = new OperationEntry({
      name: NAME,
      done: true,
      metadata: { "@type": typeUrl("CreateBackupMetadata"), name: "b" },
      error: { code: 1, message: "Operation was cancelled" },
    });

    expect(entry.name).to.equal(NAME);
    expect(entry.done).to.be.true;
    expect(entry.metadataType).to.equal(typeUrl("CreateBackupMetadata"));
    expect(entry.error).to.include({ code: "CANCELLED", message: "Operation was cancelled" });
  });

  it("should treat a missing done flag as running", () => {
    const entry = new OperationEntry({ name: NAME });

    expect(entry.done).to.be.false;
    expect(entry.metadataType).to.be.undefined;
    expect(entry.error).to.be.undefined;
  });

  it("should unpack metadata of the requested type", () => {
    const entry = new OperationEntry({
      name: NAME,
      metadata: { "@type": typeUrl("CreateBackupMetadata"), name: "b", database: "d" },
    });

    expect(entry.unpackMetadata("CreateBackupMetadata")).to.deep.equal({ name: "b", database: "d" });
    expect(() => entry.unpackMetadata("RestoreDatabaseMetadata")).to.throw(
      InvalidMetadataTypeError,
    );
  });

  it("should serialize as the raw operation", () => {
    const operation = { name: NAME, done: false };

    expect(JSON.parse(JSON.stringify(new OperationEntry(operation)))).to.deep.equal(operation);
  });
});

describe("combineFilters", () => {
  it("should AND the scope with the caller's filter", () => {
    expect(combineFilters("name:backups/test-bck", "done:true")).to.equal(
      "(name:backups/test-bck) AND (done:true)",
    );
  });

  it("should use the scope alone without a filter", () => {
    expect(combineFilters("name:databases/test-db")).to.equal("name:databases/test-db");
    expect(combineFilters("name:databases/test-db", "")).to.equal("name:databases/test-db");
  });
});
