import { describe, expect, it } from 'vitest';
import { ProbeExecutionError } from '@syncprobe/core';
import { buildFailureReport, buildReport } from './reportBuilder.js';
import type { FFProbeResult, FFProbeStream } from './probes/ffprobeSchema.js';

const h264: FFProbeStream = {
  index: 0,
  codec_type: 'video',
  codec_name: 'h264',
  width: 1920,
  height: 1080,
  avg_frame_rate: '30000/1001',
  codec_tag_string: 'avc1',
  start_time: '0.000000',
  duration: '10.000000',
};

const aac: FFProbeStream = {
  index: 1,
  codec_type: 'audio',
  codec_name: 'aac',
  sample_rate: '48000',
  channels: 2,
  channel_layout: 'stereo',
  start_time: '0.000000',
  duration: '10.000000',
};

function probeResult(streams: FFProbeStream[]): FFProbeResult {
  return {
    format: {
      filename: '/tmp/clip.mp4',
      format_name: 'mov,mp4,m4a,3gp,3g2,mj2',
      duration: '10.000000',
      size: '1048576',
      bit_rate: '838860',
    },
    streams,
  };
}

describe('buildReport', () => {
  describe('sync classification', () => {
    it('reports sync when start times and durations match', () => {
      const report = buildReport(probeResult([h264, aac]));

      expect(report.syncStatus).toBe('OK: sync present');
      expect(report.syncPolicy).toBe('start_time');
      expect(report.skew).toEqual({ startTimeSeconds: 0, durationMs: 0 });
      expect(report.secondarySync?.status).toBe('good sync');
      expect(report.codecException).toBe('OK');
    });

    it('stays in sync under the tolerance and reports the skew with three decimals', () => {
      const report = buildReport(probeResult([h264, { ...aac, start_time: '0.050000' }]));

      expect(report.syncStatus).toBe('OK: sync present');
      expect(report.syncMessage).toBe(
        'Video and audio start times differ by 0.050s, within the 0.1s tolerance.'
      );
      expect(report.skew?.startTimeSeconds).toBe(0.05);
      expect(report.duration).toBe(10);
    });

    it('flags a start-time mismatch above the tolerance', () => {
      const report = buildReport(probeResult([h264, { ...aac, start_time: '0.250000' }]));

      expect(report.syncStatus).toBe('warning: start-time mismatch');
      expect(report.syncMessage).toBe(
        'Video and audio start times differ by 0.250s. Check whether the audio track is delayed.'
      );
      expect(report.skew?.startTimeSeconds).toBe(0.25);
    });

    it('treats a skew exactly at the tolerance as a mismatch', () => {
      const report = buildReport(probeResult([h264, { ...aac, start_time: '0.100000' }]));

      expect(report.syncStatus).toBe('warning: start-time mismatch');
    });

    it('decides on the skew it reports when decimals do not subtract exactly', () => {
      const report = buildReport(probeResult([
        { ...h264, start_time: '0.200000' },
        { ...aac, start_time: '0.300000' },
      ]));

      expect(report.syncStatus).toBe('warning: start-time mismatch');
      expect(report.syncMessage).toBe(
        'Video and audio start times differ by 0.100s. Check whether the audio track is delayed.'
      );
      expect(report.skew?.startTimeSeconds).toBe(0.1);
    });

    it('measures the skew in either direction', () => {
      const report = buildReport(probeResult([{ ...h264, start_time: '1.500000' }, aac]));

      expect(report.syncStatus).toBe('warning: start-time mismatch');
      expect(report.skew?.startTimeSeconds).toBe(1.5);
    });

    it('counts a missing start time as zero', () => {
      const { start_time: _ignored, ...videoWithoutStart } = h264;
      const report = buildReport(probeResult([videoWithoutStart, { ...aac, start_time: '0.020000' }]));

      expect(report.syncStatus).toBe('OK: sync present');
      expect(report.skew?.startTimeSeconds).toBe(0.02);
    });

    it('accepts numeric timestamps as well as strings', () => {
      const report = buildReport(probeResult([{ ...h264, start_time: 0 }, { ...aac, start_time: 0.3 }]));

      expect(report.syncStatus).toBe('warning: start-time mismatch');
      expect(report.skew?.startTimeSeconds).toBe(0.3);
    });
  });

  describe('duration policy', () => {
    it('reports good sync for a small duration difference', () => {
      const report = buildReport(
        probeResult([h264, { ...aac, duration: '10.050000' }]),
        { syncPolicy: 'duration' }
      );

      expect(report.syncPolicy).toBe('duration');
      expect(report.syncStatus).toBe('good sync');
      expect(report.syncMessage).toBe(
        'Video and audio durations differ by 50.00ms, within the 100ms tolerance.'
      );
      expect(report.skew?.durationMs).toBe(50);
      expect(report.secondarySync?.status).toBe('OK: sync present');
    });

    it('flags a noticeable difference above the tolerance', () => {
      const report = buildReport(
        probeResult([h264, { ...aac, duration: '10.150000' }]),
        { syncPolicy: 'duration' }
      );

      expect(report.syncStatus).toBe('noticeable difference');
      expect(report.syncMessage).toBe(
        'Video and audio durations differ by 150.00ms. The tracks may drift apart during playback.'
      );
      expect(report.skew?.durationMs).toBe(150);
    });

    it('treats 100ms exactly as a noticeable difference', () => {
      const { duration: _ignored, ...audioWithoutDuration } = aac;
      const report = buildReport(
        probeResult([{ ...h264, duration: '0.100000' }, audioWithoutDuration]),
        { syncPolicy: 'duration' }
      );

      expect(report.syncStatus).toBe('noticeable difference');
      expect(report.skew?.durationMs).toBe(100);
    });

    it('flags 10.1s against 10.0s as a 100ms difference', () => {
      const report = buildReport(
        probeResult([{ ...h264, duration: '10.000000' }, { ...aac, duration: '10.100000' }]),
        { syncPolicy: 'duration' }
      );

      expect(report.syncStatus).toBe('noticeable difference');
      expect(report.syncMessage).toBe(
        'Video and audio durations differ by 100.00ms. The tracks may drift apart during playback.'
      );
      expect(report.skew?.durationMs).toBe(100);
    });

    it('keeps the duration verdict as a secondary check under the start-time policy', () => {
      const report = buildReport(probeResult([h264, { ...aac, duration: '10.150000' }]));

      expect(report.syncStatus).toBe('OK: sync present');
      expect(report.secondarySync).toEqual({
        status: 'noticeable difference',
        message: 'Video and audio durations differ by 150.00ms. The tracks may drift apart during playback.',
      });
    });
  });

  describe('missing streams', () => {
    it('warns about a missing audio stream and keeps the video details', () => {
      const report = buildReport(probeResult([h264]));

      expect(report.syncStatus).toBe('warning: missing audio stream');
      expect(report.syncMessage).toBe('The container has no audio track.');
      expect(report.video?.codec).toBe('h264');
      expect('audio' in report).toBe(false);
      expect('skew' in report).toBe(false);
      expect('secondarySync' in report).toBe(false);
      expect(report.codecException).toBe('warning: missing required stream');
    });

    it('warns about a missing video stream', () => {
      const report = buildReport(probeResult([aac]));

      expect(report.syncStatus).toBe('warning: missing video stream');
      expect(report.syncMessage).toBe('The container has no video track.');
      expect('video' in report).toBe(false);
      expect(report.audio?.codec).toBe('aac');
      expect(report.codecException).toBe('warning: missing required stream');
    });

    it('reports the missing video first when there are no streams at all', () => {
      const report = buildReport(probeResult([]));

      expect(report.syncStatus).toBe('warning: missing video stream');
      expect(report.codecException).toBe('warning: missing required stream');
    });

    it('ignores streams that are neither video nor audio', () => {
      const subtitle: FFProbeStream = { index: 2, codec_type: 'subtitle', codec_name: 'mov_text' };
      const report = buildReport(probeResult([subtitle, h264]));

      expect(report.syncStatus).toBe('warning: missing audio stream');
      expect(report.video?.codec).toBe('h264');
    });
  });

  describe('metadata extraction', () => {
    it('copies and converts the container fields', () => {
      const report = buildReport(probeResult([h264, aac]));

      expect(report.filename).toBe('/tmp/clip.mp4');
      expect(report.duration).toBe(10);
      expect(report.sizeBytes).toBe(1048576);
      expect(report.formatName).toBe('mov,mp4,m4a,3gp,3g2,mj2');
      expect(report.bitRate).toBe(838860);
    });

    it('falls back to defaults when the container block is empty', () => {
      const report = buildReport({ format: {}, streams: [h264, aac] });

      expect(report.filename).toBe('unknown');
      expect(report.duration).toBe(0);
      expect(report.sizeBytes).toBe(0);
      expect(report.formatName).toBe('unknown');
      expect(report.bitRate).toBe(0);
    });

    it('falls back to defaults for values ffprobe could not determine', () => {
      const raw = probeResult([h264, aac]);
      const report = buildReport({ ...raw, format: { ...raw.format, duration: 'N/A', bit_rate: 'N/A' } });

      expect(report.duration).toBe(0);
      expect(report.bitRate).toBe(0);
    });

    it('describes the video and audio streams', () => {
      const report = buildReport(probeResult([h264, aac]));

      expect(report.video).toStrictEqual({
        codec: 'h264',
        width: 1920,
        height: 1080,
        avgFrameRate: '30000/1001',
        codecTag: 'avc1',
      });
      expect(report.audio).toStrictEqual({
        codec: 'aac',
        sampleRate: 48000,
        channels: 2,
        channelLayout: 'stereo',
      });
    });

    it('uses "unknown" for missing strings and leaves missing numbers out', () => {
      const report = buildReport(probeResult([{ codec_type: 'video' }, { codec_type: 'audio' }]));

      expect(report.video).toStrictEqual({
        codec: 'unknown',
        avgFrameRate: 'unknown',
        codecTag: 'unknown',
      });
      expect(report.audio).toStrictEqual({
        codec: 'unknown',
        channelLayout: 'unknown',
      });
    });

    it('keeps numeric fields that are present but zero', () => {
      const report = buildReport(probeResult([{ ...h264, width: 0, height: 0 }, { ...aac, channels: 0 }]));

      expect(report.video?.width).toBe(0);
      expect(report.video?.height).toBe(0);
      expect(report.audio?.channels).toBe(0);
    });

    it('only considers the first stream of each type', () => {
      const coverArt: FFProbeStream = { ...h264, index: 2, codec_name: 'mjpeg', start_time: '5.000000' };
      const commentary: FFProbeStream = { ...aac, index: 3, codec_name: 'ac3' };
      const report = buildReport(probeResult([h264, aac, coverArt, commentary]));

      expect(report.video?.codec).toBe('h264');
      expect(report.audio?.codec).toBe('aac');
      expect(report.syncStatus).toBe('OK: sync present');
    });
  });

  it('produces identical output for identical input', () => {
    const raw = probeResult([h264, { ...aac, start_time: '0.123456' }]);

    expect(JSON.stringify(buildReport(raw))).toBe(JSON.stringify(buildReport(raw)));
  });
});

describe('buildFailureReport', () => {
  it('carries the tool diagnostics of a failed probe', () => {
    const error = new ProbeExecutionError(
      'ffprobe exited with code 1: Invalid data found when processing input',
      { stderr: 'Invalid data found when processing input', exitCode: 1 }
    );

    expect(buildFailureReport(error)).toEqual({
      syncStatus: 'analysis failed',
      syncMessage: 'ffprobe exited with code 1: Invalid data found when processing input',
      details: 'Invalid data found when processing input',
    });
  });

  it('leaves details empty for other errors', () => {
    expect(buildFailureReport(new Error('boom'))).toEqual({
      syncStatus: 'analysis failed',
      syncMessage: 'boom',
      details: '',
    });
  });
});
