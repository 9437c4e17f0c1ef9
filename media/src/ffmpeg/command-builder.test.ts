import { describe, expect, it } from 'vitest';
import { fullPlan, mediaAsset, planFor } from '../testing/plans.js';
import { buildFfmpegCommand, escapeFilterPath } from './command-builder.js';

describe('buildFfmpegCommand', () => {
  describe('inputs and output', () => {
    it('opens every plan input once, in plan order', () => {
      const command = buildFfmpegCommand(fullPlan(), '/out/video.mp4', {}, { subtitlePath: '/work/subs.srt' });

      expect(command.inputFiles).toEqual([
        '/media/intro.mp4',
        '/media/slow.mp4',
        '/media/logo.mov',
        '/media/voice.mp3',
        '/media/music.mp3',
      ]);
      expect(command.args.slice(0, 11)).toEqual([
        '-y',
        '-i',
        '/media/intro.mp4',
        '-i',
        '/media/slow.mp4',
        '-i',
        '/media/logo.mov',
        '-i',
        '/media/voice.mp3',
        '-i',
        '/media/music.mp3',
      ]);
    });

    it('maps the final streams and encodes with libx264 and aac', () => {
      const command = buildFfmpegCommand(fullPlan(), '/out/video.mp4', {}, { subtitlePath: '/work/subs.srt' });

      expect(command.args.slice(11)).toEqual([
        '-filter_complex',
        command.filterGraph,
        '-map',
        '[v11]',
        '-map',
        '[aout]',
        '-c:v',
        'libx264',
        '-preset',
        'medium',
        '-crf',
        '23',
        '-pix_fmt',
        'yuv420p',
        '-r',
        '25',
        '-s',
        '1280x720',
        '-c:a',
        'aac',
        '-b:a',
        '192k',
        '-t',
        '12',
        '-movflags',
        '+faststart',
        '/out/video.mp4',
      ]);
      expect(command.ffmpegPath).toBe('ffmpeg');
      expect(command.outputPath).toBe('/out/video.mp4');
    });

    it('applies encoder options over the defaults', () => {
      const command = buildFfmpegCommand(
        fullPlan(),
        '/out/video.mp4',
        { ffmpegPath: '/opt/ffmpeg', preset: 'veryfast', crf: 18, audioBitrate: '128k' },
        { subtitlePath: '/work/subs.srt' },
      );

      expect(command.ffmpegPath).toBe('/opt/ffmpeg');
      expect(command.args).toContain('veryfast');
      expect(command.args[command.args.indexOf('-crf') + 1]).toBe('18');
      expect(command.args[command.args.indexOf('-b:a') + 1]).toBe('128k');
    });
  });

  describe('filter graph', () => {
    const filters = buildFfmpegCommand(fullPlan(), '/out/video.mp4', {}, { subtitlePath: '/work/subs.srt' })
      .filterGraph.split(';');

    it('cuts, retimes and generates the base segments', () => {
      expect(filters.slice(0, 4)).toEqual([
        '[0:v]trim=start=0:end=4,setpts=PTS-STARTPTS[v0]',
        '[1:v]trim=start=0:end=3,setpts=PTS-STARTPTS[v1]',
        'color=c=navy:s=1280x720:r=25:d=2[v2]',
        '[v1]setpts=2*PTS[v3]',
      ]);
    });

    it('fits every segment into the frame before concatenating', () => {
      expect(filters[4]).toBe(
        '[v0]scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2:black,setsar=1,fps=25,format=yuv420p[v4]',
      );
      expect(filters[5].startsWith('[v3]scale=1280:720')).toBe(true);
      expect(filters[6].startsWith('[v2]scale=1280:720')).toBe(true);
      expect(filters[8]).toBe('[v4][v5][v6]concat=n=3:v=1:a=0[v8]');
    });

    it('scales and shifts the overlay, then draws it during its interval', () => {
      expect(filters[7]).toBe('[2:v]scale=256:144[v7]');
      expect(filters[9]).toBe('[v7]setpts=PTS-STARTPTS+1/TB[v9]');
      expect(filters[10]).toBe("[v8][v9]overlay=x=960:y=36:enable='between(t,1,3)'[v10]");
    });

    it('burns subtitles from the side file', () => {
      expect(filters[11]).toBe("[v10]subtitles='/work/subs.srt'[v11]");
    });

    it('mixes narration, base audio and music', () => {
      expect(filters[12]).toBe('[3:a]atrim=start=0:duration=2,asetpts=PTS-STARTPTS,adelay=1000:all=1,volume=1[aud0]');
      expect(filters[13]).toBe(
        "[0:a]atrim=start=0:duration=4,asetpts=PTS-STARTPTS,volume='if(lt(t,1),1,if(lt(t,3),0.251189,1))':eval=frame[aud1]",
      );
      expect(filters[14]).toBe(
        "[4:a]atrim=start=0:duration=12,asetpts=PTS-STARTPTS,volume='if(lt(t,1),0.501187,if(lt(t,3),0.125893,0.501187))':eval=frame[aud2]",
      );
      expect(filters[15]).toBe(
        '[aud0][aud1][aud2]amix=inputs=3:duration=longest:normalize=0,apad=whole_dur=12,atrim=0:12[aout]',
      );
      expect(filters).toHaveLength(16);
    });
  });

  describe('subtitles', () => {
    it('attaches soft subtitles as a mov_text stream', () => {
      const command = buildFfmpegCommand(fullPlan('soft'), '/out/video.mp4', {}, { subtitlePath: '/work/subs.srt' });

      expect(command.inputFiles[5]).toBe('/work/subs.srt');
      expect(command.filterGraph).not.toContain('subtitles=');
      expect(command.args).toEqual(
        expect.arrayContaining(['-map', '[v10]', '-map', '5:s', '-c:s', 'mov_text']),
      );
    });

    it('requires a subtitle file when the plan has cues', () => {
      expect(() => buildFfmpegCommand(fullPlan(), '/out/video.mp4')).toThrow(
        expect.objectContaining({ kind: 'EncoderError', code: 'E003' }),
      );
    });
  });

  it('fills a plan without audio layers with silence', () => {
    const plan = planFor({ clips: [{ id: 'a', asset: 'mute.mp4', start: 0, end: 5 }] }, [
      mediaAsset('mute.mp4', 5, { audio: false }),
    ]);

    const command = buildFfmpegCommand(plan, '/out/video.mp4');

    expect(command.filterGraph.split(';')).toEqual([
      '[0:v]trim=start=0:end=5,setpts=PTS-STARTPTS[v0]',
      '[v0]scale=1920:1080:force_original_aspect_ratio=decrease,pad=1920:1080:(ow-iw)/2:(oh-ih)/2:black,setsar=1,fps=30,format=yuv420p[v1]',
      '[v1]concat=n=1:v=1:a=0[v2]',
      'anullsrc=channel_layout=stereo:sample_rate=44100,atrim=0:5[aout]',
    ]);
  });
});

describe('escapeFilterPath', () => {
  it('escapes colons, quotes and backslashes', () => {
    expect(escapeFilterPath('C:\\subs\\it\'s.srt')).toBe("C\\:\\\\\\\\subs\\\\\\\\it'\\''s.srt");
  });
});
