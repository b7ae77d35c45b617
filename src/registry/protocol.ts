import { ConflictError, withOperation } from "../errors.js";
import type { HttpClient } from "../http/client.js";
import type { Logger } from "../log/logger.js";
import type { ReleaseMetadata } from "../release/metadata.js";
import type { Tarball } from "../release/tarball.js";
import type { RegistryClient } from "./client.js";
import { nextPublishState, type PublishEvent, type PublishState } from "./state-machine.js";
import { transferTarball } from "./transfer.js";

export type PublishRequest = {
  uploadName: string;
  version: string;
  metadata: ReleaseMetadata;
  tarball: Tarball;
};

export type PublishOutcome =
  | { state: "published"; releaseId: string }
  | { state: "skipped" };

export type PublishProtocolDeps = {
  client: RegistryClient;
  http: HttpClient;
  logger: Logger;
  errorOnConflict: boolean;
};

/**
 * Drives stage → transfer → publish through the state machine.
 * Strictly sequential; nothing is retried.
 */
export class PublishProtocol {
  private state: PublishState = "built";
  private readonly transitions: PublishState[] = ["built"];

  constructor(private readonly deps: PublishProtocolDeps) {}

  /** States visited so far, starting with "built". */
  get history(): readonly PublishState[] {
    return this.transitions;
  }

  private advance(event: PublishEvent): PublishState {
    this.state = nextPublishState(this.state, event, { errorOnConflict: this.deps.errorOnConflict });
    this.transitions.push(this.state);
    return this.state;
  }

  private async step<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withOperation(operation, fn);
    } catch (err) {
      this.advance("failure");
      throw err;
    }
  }

  async run(req: PublishRequest): Promise<PublishOutcome> {
    const { client, http, logger } = this.deps;
    const release = `${req.uploadName}/${req.version}`;

    const staged = await this.step("stage", () => client.stage(req));
    if (staged.status === "conflict") {
      logger.info(
        "RELEASE_EXISTS",
        `Release for revision \`${req.metadata.revision}\` of ${release} already exists; flakehub-push will not upload it again`,
      );
      if (this.advance("conflict") === "conflicted") {
        throw new ConflictError(req.uploadName, req.version);
      }
      return { state: "skipped" };
    }
    this.advance("staged");
    logger.debug("STAGED", `Staged ${release}`, { releaseId: staged.result.releaseId });

    await this.step("transfer", () => transferTarball(http, staged.result.uploadUrl, req.tarball));
    this.advance("transferred");

    await this.step("publish", () => client.publish(staged.result.releaseId));
    this.advance("published");

    logger.info("PUBLISHED", `Successfully released new version of ${release}`);
    return { state: "published", releaseId: staged.result.releaseId };
  }
}
