import { Logger } from "@nestjs/common";
import { Test } from "@nestjs/testing";
import type { TrendMetric } from "@habitlens/shared";
import { GENERIC_SYSTEM_MESSAGE, SystemError } from "../common/errors";
import { PIPELINE_CONFIG, loadPipelineConfig } from "../config/pipeline.config";
import { HistoryFeedService } from "./history-feed.service";
import { HISTORY_REPOSITORY } from "./history.repository";

const RANGE = { start: "2026-03-01T00:00:00.000Z", end: "2026-03-31T00:00:00.000Z" };

describe("HistoryFeedService", () => {
  let service: HistoryFeedService;
  let fetch: jest.Mock;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    fetch = jest.fn();
    errorSpy = jest.spyOn(Logger.prototype, "error").mockImplementation(() => undefined);

    const module = await Test.createTestingModule({
      providers: [
        HistoryFeedService,
        { provide: HISTORY_REPOSITORY, useValue: { fetch } },
        { provide: PIPELINE_CONFIG, useValue: loadPipelineConfig({ HISTORY_TIMEOUT_MS: "100" }) },
      ],
    }).compile();

    service = module.get(HistoryFeedService);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it("reads every metric and keeps those with points", async () => {
    const points = [{ timestamp: "2026-03-02T08:00:00.000Z", value: 2000 }];
    fetch.mockImplementation(async (_userId: string, metric: TrendMetric) =>
      metric === "water_intake" ? points : [],
    );

    const series = await service.fetchSeries("user-1", RANGE);

    expect(series).toEqual({ water_intake: points });
    expect(fetch).toHaveBeenCalledTimes(10);
    expect(fetch).toHaveBeenCalledWith("user-1", "sleep_quality", RANGE);
  });

  it("turns a slow repository into a generic SystemError", async () => {
    fetch.mockReturnValue(new Promise(() => undefined));

    await expect(service.fetchSeries("user-1", RANGE)).rejects.toThrow(SystemError);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("no response within 100ms"));
  });

  it("logs the cause of a repository failure without exposing it", async () => {
    fetch.mockRejectedValue(new Error("connection refused"));

    const error: unknown = await service.fetchSeries("user-1", RANGE).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SystemError);
    expect(error).toHaveProperty("message", GENERIC_SYSTEM_MESSAGE);
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining("connection refused"));
  });
});
