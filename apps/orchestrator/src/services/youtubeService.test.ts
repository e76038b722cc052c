import { describe, expect, it, vi, beforeEach } from "vitest";

import { silentLogger } from "../logger.js";
import { RemoteCallError } from "../errors.js";
import { YoutubeService } from "./youtubeService.js";

const mocks = vi.hoisted(() => ({
  youtubeFactory: vi.fn(),
  listBroadcasts: vi.fn(),
  insertBroadcast: vi.fn(),
  updateBroadcast: vi.fn(),
  bindBroadcast: vi.fn(),
  transitionBroadcast: vi.fn(),
  insertStream: vi.fn(),
  listStreams: vi.fn()
}));

vi.mock("googleapis", () => ({
  google: {
    youtube: mocks.youtubeFactory
  }
}));

const createApiError = (message: string, reasons: string[] = []): Error & { response: unknown } => {
  const error = new Error(message) as Error & { response: unknown };
  error.response = {
    data: {
      error: {
        message,
        errors: reasons.map((reason) => ({ reason }))
      }
    }
  };
  return error;
};

const createService = (): YoutubeService => {
  return new YoutubeService(
    { buildOAuthClient: vi.fn().mockReturnValue({}) } as never,
    { privacyStatus: "unlisted", logger: silentLogger() }
  );
};

describe("YoutubeService", () => {
  beforeEach(() => {
    vi.clearAllMocks();

    mocks.youtubeFactory.mockReturnValue({
      liveBroadcasts: {
        list: mocks.listBroadcasts,
        insert: mocks.insertBroadcast,
        update: mocks.updateBroadcast,
        bind: mocks.bindBroadcast,
        transition: mocks.transitionBroadcast
      },
      liveStreams: {
        insert: mocks.insertStream,
        list: mocks.listStreams
      }
    });
  });

  it("picks the most advanced broadcast bound to the ingest across pages", async () => {
    mocks.listBroadcasts
      .mockResolvedValueOnce({
        data: {
          nextPageToken: "page-2",
          items: [
            {
              id: "ready-1",
              snippet: { scheduledStartTime: "2026-02-11T20:00:00.000Z" },
              contentDetails: { boundStreamId: "ingest-1" },
              status: { lifeCycleStatus: "ready" }
            },
            {
              id: "other-ingest",
              contentDetails: { boundStreamId: "ingest-2" },
              status: { lifeCycleStatus: "live" }
            }
          ]
        }
      })
      .mockResolvedValueOnce({
        data: {
          items: [
            {
              id: "done-1",
              contentDetails: { boundStreamId: "ingest-1" },
              status: { lifeCycleStatus: "complete" }
            },
            {
              id: "testing-1",
              snippet: {},
              contentDetails: { boundStreamId: "ingest-1" },
              status: { lifeCycleStatus: "testing" }
            }
          ]
        }
      });

    const result = await createService().listReusableBroadcast("ingest-1");

    expect(mocks.listBroadcasts).toHaveBeenCalledTimes(2);
    expect(mocks.listBroadcasts.mock.calls[0]?.[0]).toEqual({
      part: ["id", "snippet", "contentDetails", "status"],
      mine: true,
      maxResults: 50,
      pageToken: undefined
    });
    expect(mocks.listBroadcasts.mock.calls[1]?.[0].pageToken).toBe("page-2");
    expect(result).toEqual({ id: "testing-1", lifecycle: "testing", scheduledStartIsoUtc: null });
  });

  it("returns null when no broadcast is bound to the ingest", async () => {
    mocks.listBroadcasts.mockResolvedValueOnce({
      data: {
        items: [
          {
            id: "revoked-1",
            contentDetails: { boundStreamId: "ingest-1" },
            status: { lifeCycleStatus: "revoked" }
          }
        ]
      }
    });

    await expect(createService().listReusableBroadcast("ingest-1")).resolves.toBeNull();
  });

  it("maps live-streaming eligibility API errors to actionable guidance", async () => {
    mocks.insertBroadcast.mockRejectedValueOnce(
      createApiError("The user is not enabled for live streaming.", ["liveStreamingNotEnabled"])
    );

    const failure = createService().createBroadcast("Live stream", "2026-02-11T21:00:00.000Z");

    await expect(failure).rejects.toBeInstanceOf(RemoteCallError);
    await expect(failure).rejects.toThrow(
      "This channel is not currently eligible to go live via API. In YouTube Studio, verify Live is enabled, phone verification is complete, no active live restrictions exist, and if recently enabled wait up to 24 hours."
    );
  });

  it("keeps the API message and lower-cased reasons on other failures", async () => {
    mocks.transitionBroadcast.mockRejectedValueOnce(
      createApiError("Invalid transition", ["invalidTransition"])
    );

    const error = await createService()
      .transitionBroadcast("broadcast-1", "live")
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({ message: "Invalid transition", reasons: ["invalidtransition"] });
  });

  it("creates broadcasts with manual start and stop", async () => {
    mocks.insertBroadcast.mockResolvedValueOnce({ data: { id: "broadcast-1" } });

    const id = await createService().createBroadcast("Live stream", "2026-02-11T21:00:00.000Z");

    expect(id).toBe("broadcast-1");
    expect(mocks.insertBroadcast).toHaveBeenCalledWith({
      part: ["snippet", "status", "contentDetails"],
      requestBody: {
        snippet: { title: "Live stream", scheduledStartTime: "2026-02-11T21:00:00.000Z" },
        status: { privacyStatus: "unlisted", selfDeclaredMadeForKids: false },
        contentDetails: { enableAutoStart: false, enableAutoStop: false }
      }
    });
  });

  it("reads ingest status and health", async () => {
    mocks.listStreams.mockResolvedValueOnce({
      data: {
        items: [{ id: "ingest-1", status: { streamStatus: "active", healthStatus: { status: "good" } } }]
      }
    });

    await expect(createService().getIngestStatus("ingest-1")).resolves.toEqual({
      status: "active",
      health: "good"
    });
  });

  it("reports an unknown ingest as null status", async () => {
    mocks.listStreams.mockResolvedValueOnce({ data: { items: [] } });

    await expect(createService().getIngestStatus("missing")).resolves.toEqual({
      status: null,
      health: null
    });
  });

  it("finds an ingest by its key on a later page", async () => {
    mocks.listStreams
      .mockResolvedValueOnce({
        data: {
          nextPageToken: "next",
          items: [{ id: "ingest-1", cdn: { ingestionInfo: { streamName: "key-one" } } }]
        }
      })
      .mockResolvedValueOnce({
        data: {
          items: [{ id: "ingest-2", cdn: { ingestionInfo: { streamName: "key-two" } } }]
        }
      });

    await expect(createService().findIngestByKey("key-two")).resolves.toBe("ingest-2");
    expect(mocks.listStreams).toHaveBeenCalledTimes(2);
  });

  it("returns the configured ingest without calling the API", async () => {
    await expect(createService().ensureIngest("ingest-9")).resolves.toBe("ingest-9");
    expect(mocks.insertStream).not.toHaveBeenCalled();
  });

  it("creates a reusable ingest when none is configured", async () => {
    mocks.insertStream.mockResolvedValueOnce({ data: { id: "ingest-new" } });

    await expect(createService().ensureIngest(null)).resolves.toBe("ingest-new");
    expect(mocks.insertStream.mock.calls[0]?.[0].requestBody.contentDetails).toEqual({ isReusable: true });
  });

  it("updates title and scheduled start of a reused broadcast", async () => {
    mocks.updateBroadcast.mockResolvedValueOnce({ data: {} });

    await createService().updateBroadcastSchedule("broadcast-1", "Morning show", "2026-02-12T00:00:00.000Z");

    expect(mocks.updateBroadcast).toHaveBeenCalledWith({
      part: ["snippet"],
      requestBody: {
        id: "broadcast-1",
        snippet: { title: "Morning show", scheduledStartTime: "2026-02-12T00:00:00.000Z" }
      }
    });
  });
});
