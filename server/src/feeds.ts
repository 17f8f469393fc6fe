import type { Random } from "./common";
import { createTicker, randomInt, uniform } from "./common";
import type { BroadcastHub } from "./hub";
import type { Detection } from "./model";

// 1x1 grey JPEG
const placeholderFrame =
  "/9j/4AAQSkZJRgABAQEASABIAAD/2wBDAP//////////////////////////////////////////////////////////////////////////////////////wgALCAABAAEBAREA/8QAFBABAAAAAAAAAAAAAAAAAAAAAP/aAAgBAQABPxA=";

const labels = ["person", "vehicle", "animal", "bicycle"];

export type Feeds = {
  start: () => void;
  stop: () => Promise<void>;
};

export type FeedOptions = {
  publish: BroadcastHub["publish"];
  videoPeriod: number;
  detectionPeriod: number;
  random?: Random;
};

export const detect = (random: Random): Detection[] =>
  Array.from({ length: randomInt(random, 0, 3) }, (): Detection => {
    const width = uniform(random, 0.05, 0.3);
    const height = uniform(random, 0.05, 0.3);
    return {
      label: labels[randomInt(random, 0, labels.length - 1)],
      confidence: Math.round(uniform(random, 0.5, 0.99) * 100) / 100,
      bbox: [
        uniform(random, 0, 1 - width),
        uniform(random, 0, 1 - height),
        width,
        height,
      ],
    };
  });

/**
 * Stand-in producers for the camera and vision pipeline.
 */
export const createSyntheticFeeds = ({
  publish,
  videoPeriod,
  detectionPeriod,
  random = Math.random,
}: FeedOptions) => {
  const controller = new AbortController();
  let tasks: Promise<void>[] = [];
  let sequence = 0;

  const frame = async () => {
    await publish("video", {
      frame: placeholderFrame,
      format: "jpeg",
      sequence: sequence++,
      timestamp: new Date().toISOString(),
    });
  };

  const detections = async () => {
    const detections = detect(random);
    await publish("detections", {
      detections,
      count: detections.length,
      timestamp: new Date().toISOString(),
    });
  };

  const start = () => {
    if (tasks.length) return;
    tasks = [
      createTicker("feed:video", frame, videoPeriod, controller.signal).done,
      createTicker(
        "feed:detections",
        detections,
        detectionPeriod,
        controller.signal,
      ).done,
    ];
  };

  const stop = async () => {
    controller.abort();
    await Promise.all(tasks);
  };

  return { start, stop } satisfies Feeds;
};
