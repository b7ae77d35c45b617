import { BadRequestError, TransportError, UnauthorizedError } from "../errors.js";
import { USER_AGENT, defaultHttpClient, type HttpClient } from "../http/client.js";
import type { ReleaseMetadata } from "../release/metadata.js";
import type { Tarball } from "../release/tarball.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type StageResult = {
  /** Presigned URL the tarball is PUT to. */
  uploadUrl: string;
  releaseId: string;
};

export type StageOutcome = { status: "staged"; result: StageResult } | { status: "conflict" };

export type StageRequest = {
  uploadName: string;
  version: string;
  metadata: ReleaseMetadata;
  tarball: Tarball;
};

type StageResponseBody = {
  s3_upload_url?: string;
  uuid?: string;
  upload_url?: string;
  release_id?: string;
};

/** Error bodies are sometimes a JSON string literal; unwrap those. */
export function unwrapErrorBody(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    return typeof parsed === "string" ? parsed : body;
  } catch {
    return body;
  }
}

export type RegistryClientOptions = {
  host: string;
  token: string;
  http?: HttpClient;
  schemas?: SchemaRegistry;
};

/** Authenticated client for the registry's upload and publish endpoints. */
export class RegistryClient {
  private readonly host: string;
  private readonly token: string;
  private readonly http: HttpClient;
  private schemas?: SchemaRegistry;

  constructor(opts: RegistryClientOptions) {
    this.host = opts.host.replace(/\/+$/, "");
    this.token = opts.token;
    this.http = opts.http ?? defaultHttpClient;
    this.schemas = opts.schemas;
  }

  private getHeaders(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.token}`,
      "Content-Type": "application/json",
      "User-Agent": USER_AGENT,
    };
  }

  stageUrl(uploadName: string, version: string, tarball: Tarball): string {
    return `${this.host}/upload/${uploadName}/${version}/${tarball.bytes.length}/${tarball.hashBase64}`;
  }

  publishUrl(releaseId: string): string {
    return `${this.host}/publish/${releaseId}`;
  }

  /** Declare a release. A 409 is reported as a conflict, not thrown. */
  async stage(req: StageRequest): Promise<StageOutcome> {
    const response = await this.http.fetch(this.stageUrl(req.uploadName, req.version, req.tarball), {
      method: "POST",
      headers: this.getHeaders(),
      body: JSON.stringify(req.metadata),
    });

    // Conflict first: it is the one status with two legal outcomes.
    if (response.status === 409) {
      await response.body?.cancel();
      return { status: "conflict" };
    }

    const body = await response.text();
    switch (response.status) {
      case 200:
        return { status: "staged", result: await this.decodeStageResponse(body) };
      case 401:
        throw new UnauthorizedError(unwrapErrorBody(body));
      case 400:
        throw new BadRequestError(unwrapErrorBody(body));
      default:
        throw new TransportError(`Status ${response.status} from metadata POST\n${body}`);
    }
  }

  private async decodeStageResponse(body: string): Promise<StageResult> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch (err) {
      throw new TransportError("Decoding release metadata POST response", { cause: err });
    }

    this.schemas ??= await createRegistry();
    const checked = await this.schemas.validate<StageResponseBody>("stage-response", parsed);
    if (!checked.valid) {
      throw new TransportError(`Decoding release metadata POST response: ${checked.errors}`);
    }

    const uploadUrl = checked.value.s3_upload_url ?? checked.value.upload_url;
    const releaseId = checked.value.uuid ?? checked.value.release_id;
    if (uploadUrl === undefined || releaseId === undefined) {
      throw new TransportError("Decoding release metadata POST response: missing upload URL or release id");
    }
    return { uploadUrl, releaseId };
  }

  /** Make a transferred release visible. */
  async publish(releaseId: string): Promise<void> {
    const response = await this.http.fetch(this.publishUrl(releaseId), {
      method: "POST",
      headers: this.getHeaders(),
    });
    if (response.status !== 200) {
      const body = await response.text();
      throw new TransportError(`Status ${response.status} from publish POST\n${body}`);
    }
  }
}
