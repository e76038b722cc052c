import type {
  BroadcastLifecycle,
  BroadcastService,
  BroadcastTransitionTarget,
  IngestStatusReading,
  PrivacyStatus,
  ReusableBroadcast
} from "@relaycam/shared";
import {
  parseBroadcastLifecycle,
  parseIngestHealth,
  parseIngestStatus,
  pickReusableBroadcast
} from "@relaycam/shared";
import { google, type youtube_v3 } from "googleapis";
import type { Logger } from "pino";

import { RemoteCallError, errorMessage } from "../errors.js";
import type { OauthService } from "./oauthService.js";

const LIST_PAGE_SIZE = 50;
const MAX_LIST_PAGES = 20;

const NOT_ENABLED_MESSAGE =
  "This channel is not currently eligible to go live via API. In YouTube Studio, verify Live is enabled, phone verification is complete, no active live restrictions exist, and if recently enabled wait up to 24 hours.";

export type YoutubeServiceOptions = {
  privacyStatus: PrivacyStatus;
  logger: Logger;
};

type ApiErrorDetails = {
  message: string;
  reasons: string[];
  status: number | null;
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null;
};

const extractApiErrorDetails = (error: unknown): ApiErrorDetails => {
  const message = errorMessage(error);
  if (!isRecord(error)) {
    return { message, reasons: [], status: null };
  }

  const status = typeof error.status === "number" ? error.status : typeof error.code === "number" ? error.code : null;
  const response = error.response;
  const data = isRecord(response) ? response.data : undefined;
  const apiError = isRecord(data) ? data.error : undefined;

  if (!isRecord(apiError)) {
    return { message, reasons: [], status };
  }

  const entries = Array.isArray(apiError.errors) ? apiError.errors : [];
  const reasons = entries
    .map((entry: unknown) => (isRecord(entry) ? entry.reason : undefined))
    .filter((reason): reason is string => typeof reason === "string")
    .map((reason) => reason.toLowerCase());

  // Favor explicit API messages when available.
  const nestedMessage = apiError.message;
  if (typeof nestedMessage === "string" && nestedMessage.trim()) {
    return { message: nestedMessage, reasons, status };
  }

  return { message, reasons, status };
};

export const normalizeYoutubeError = (error: unknown): RemoteCallError => {
  if (error instanceof RemoteCallError) {
    return error;
  }

  const details = extractApiErrorDetails(error);
  const combined = [details.message, ...details.reasons].join(" ").toLowerCase();

  if (
    combined.includes("the user is not enabled for live streaming") ||
    details.reasons.includes("livestreamingnotenabled")
  ) {
    return new RemoteCallError(NOT_ENABLED_MESSAGE, details.reasons, details.status, { cause: error });
  }

  return new RemoteCallError(details.message, details.reasons, details.status, { cause: error });
};

const toReusableBroadcast = (
  item: youtube_v3.Schema$LiveBroadcast,
  ingestId: string
): ReusableBroadcast | null => {
  if (!item.id || item.contentDetails?.boundStreamId !== ingestId) {
    return null;
  }

  const lifecycle = parseBroadcastLifecycle(item.status?.lifeCycleStatus);
  if (!lifecycle) {
    return null;
  }

  return {
    id: item.id,
    lifecycle,
    scheduledStartIsoUtc: item.snippet?.scheduledStartTime ?? null
  };
};

export class YoutubeService implements BroadcastService {
  private youtube: youtube_v3.Youtube | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly oauthService: Pick<OauthService, "buildOAuthClient">,
    private readonly options: YoutubeServiceOptions
  ) {
    this.logger = options.logger;
  }

  async ensureIngest(ingestId: string | null): Promise<string> {
    if (ingestId) {
      return ingestId;
    }

    const created = await this.call(async (youtube) => {
      const response = await youtube.liveStreams.insert({
        part: ["snippet", "cdn", "contentDetails"],
        requestBody: {
          snippet: { title: "relaycam ingest" },
          cdn: { frameRate: "30fps", resolution: "720p", ingestionType: "rtmp" },
          contentDetails: { isReusable: true }
        }
      });
      return response.data;
    });

    if (!created.id) {
      throw new RemoteCallError("YouTube API returned a stream without an id");
    }

    this.logger.warn(
      { ingestId: created.id },
      "Created a new ingest stream; set YT_STREAM_ID to reuse it across restarts"
    );
    return created.id;
  }

  async createBroadcast(title: string, scheduledStartIsoUtc: string): Promise<string> {
    const created = await this.call(async (youtube) => {
      const response = await youtube.liveBroadcasts.insert({
        part: ["snippet", "status", "contentDetails"],
        requestBody: {
          snippet: { title, scheduledStartTime: scheduledStartIsoUtc },
          status: { privacyStatus: this.options.privacyStatus, selfDeclaredMadeForKids: false },
          contentDetails: { enableAutoStart: false, enableAutoStop: false }
        }
      });
      return response.data;
    });

    if (!created.id) {
      throw new RemoteCallError("YouTube API returned a broadcast without an id");
    }

    return created.id;
  }

  async bindBroadcast(broadcastId: string, ingestId: string): Promise<void> {
    await this.call((youtube) =>
      youtube.liveBroadcasts.bind({
        part: ["id", "contentDetails"],
        id: broadcastId,
        streamId: ingestId
      })
    );
  }

  async transitionBroadcast(broadcastId: string, target: BroadcastTransitionTarget): Promise<void> {
    await this.call((youtube) =>
      youtube.liveBroadcasts.transition({
        part: ["status", "id"],
        id: broadcastId,
        broadcastStatus: target
      })
    );
  }

  async getIngestStatus(ingestId: string): Promise<IngestStatusReading> {
    const item = await this.call(async (youtube) => {
      const response = await youtube.liveStreams.list({ part: ["status"], id: [ingestId] });
      return response.data.items?.[0];
    });

    return {
      status: parseIngestStatus(item?.status?.streamStatus),
      health: parseIngestHealth(item?.status?.healthStatus?.status)
    };
  }

  async getBroadcastLifecycle(broadcastId: string): Promise<BroadcastLifecycle | null> {
    const item = await this.call(async (youtube) => {
      const response = await youtube.liveBroadcasts.list({ part: ["status"], id: [broadcastId] });
      return response.data.items?.[0];
    });

    return parseBroadcastLifecycle(item?.status?.lifeCycleStatus);
  }

  /**
   * Lists every broadcast on the channel. `broadcastStatus` is left out
   * because some accounts reject it together with `mine`.
   */
  async listReusableBroadcast(ingestId: string): Promise<ReusableBroadcast | null> {
    const candidates: ReusableBroadcast[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page += 1) {
      const data = await this.call(async (youtube) => {
        const response = await youtube.liveBroadcasts.list({
          part: ["id", "snippet", "contentDetails", "status"],
          mine: true,
          maxResults: LIST_PAGE_SIZE,
          pageToken
        });
        return response.data;
      });

      for (const item of data.items ?? []) {
        const candidate = toReusableBroadcast(item, ingestId);
        if (candidate) {
          candidates.push(candidate);
        }
      }

      if (!data.nextPageToken) {
        return pickReusableBroadcast(candidates);
      }
      pageToken = data.nextPageToken;
    }

    this.logger.warn({ pages: MAX_LIST_PAGES }, "Broadcast listing truncated");
    return pickReusableBroadcast(candidates);
  }

  async getIngestKey(ingestId: string): Promise<string | null> {
    const item = await this.call(async (youtube) => {
      const response = await youtube.liveStreams.list({ part: ["cdn"], id: [ingestId] });
      return response.data.items?.[0];
    });

    return item?.cdn?.ingestionInfo?.streamName ?? null;
  }

  async findIngestByKey(streamKey: string): Promise<string | null> {
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page += 1) {
      const data = await this.call(async (youtube) => {
        const response = await youtube.liveStreams.list({
          part: ["id", "cdn"],
          mine: true,
          maxResults: LIST_PAGE_SIZE,
          pageToken
        });
        return response.data;
      });

      const match = (data.items ?? []).find((item) => item.cdn?.ingestionInfo?.streamName === streamKey);
      if (match?.id) {
        return match.id;
      }

      if (!data.nextPageToken) {
        return null;
      }
      pageToken = data.nextPageToken;
    }

    return null;
  }

  async updateBroadcastSchedule(broadcastId: string, title: string, scheduledStartIsoUtc: string): Promise<void> {
    await this.call((youtube) =>
      youtube.liveBroadcasts.update({
        part: ["snippet"],
        requestBody: {
          id: broadcastId,
          snippet: { title, scheduledStartTime: scheduledStartIsoUtc }
        }
      })
    );
  }

  private async call<T>(operation: (youtube: youtube_v3.Youtube) => Promise<T>): Promise<T> {
    const youtube = this.getYoutubeClient();

    try {
      return await operation(youtube);
    } catch (error) {
      throw normalizeYoutubeError(error);
    }
  }

  private getYoutubeClient(): youtube_v3.Youtube {
    if (!this.youtube) {
      const auth = this.oauthService.buildOAuthClient();
      this.youtube = google.youtube({ version: "v3", auth });
    }

    return this.youtube;
  }
}
