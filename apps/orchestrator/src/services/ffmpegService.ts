import ffmpegInstaller from "@ffmpeg-installer/ffmpeg";

import type { TranscoderConfig } from "@relaycam/shared";

export const resolveFfmpegPath = (config: TranscoderConfig): string => {
  return config.ffmpegPath ?? ffmpegInstaller.path;
};

export const buildIngestUrl = (ingestBaseUrl: string, streamKey: string): string => {
  return `${ingestBaseUrl.replace(/\/+$/, "")}/${streamKey}`;
};

/**
 * RTSP (over TCP) in, FLV out. A silent stereo track is muxed in because the
 * platform flags streams without audio.
 */
export const buildTranscoderArgs = (config: TranscoderConfig, ingestUrl: string): string[] => {
  return [
    resolveFfmpegPath(config),
    "-hide_banner",
    "-loglevel",
    "warning",
    "-rtsp_transport",
    "tcp",
    "-thread_queue_size",
    "512",
    "-i",
    config.sourceUrl,
    "-f",
    "lavfi",
    "-i",
    `anullsrc=channel_layout=stereo:sample_rate=${config.audioSampleRate}`,
    "-map",
    "0:v:0",
    "-map",
    "1:a:0",
    "-c:v",
    "libx264",
    "-preset",
    "veryfast",
    "-b:v",
    config.videoBitrate,
    "-maxrate",
    config.videoBitrate,
    "-bufsize",
    "6000k",
    "-g",
    config.keyframeInterval.toString(),
    "-r",
    config.videoFps.toString(),
    "-vf",
    `scale=${config.videoWidth}:${config.videoHeight},format=yuv420p`,
    "-c:a",
    "aac",
    "-b:a",
    config.audioBitrate,
    "-ar",
    config.audioSampleRate.toString(),
    "-ac",
    "2",
    "-f",
    "flv",
    ingestUrl
  ];
};
