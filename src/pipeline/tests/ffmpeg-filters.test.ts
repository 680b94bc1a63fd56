import { describe, it, expect } from 'vitest';
import { buildTransitionFilter } from '../../shared/capabilities/media/ffmpeg-compositor.js';
import { buildAudioMixFilter } from '../../shared/capabilities/media/ffmpeg-audio-mixer.js';
import { formatSeconds } from '../../shared/capabilities/media/ffmpeg-utils.js';
import { PermanentError } from '../../shared/utils/errors.js';

describe('formatSeconds', () => {
    it('should keep at most millisecond precision without trailing zeros', () => {
        expect(formatSeconds(6)).toBe('6');
        expect(formatSeconds(5.5)).toBe('5.5');
        expect(formatSeconds(1.23456)).toBe('1.235');
    });
});

describe('buildTransitionFilter', () => {
    it('should overlap crossfaded clips and concatenate the rest', () => {
        const filter = buildTransitionFilter([
            { durationSeconds: 6, hasAudio: true, transitionToNext: 'crossfade' },
            { durationSeconds: 5, hasAudio: false, transitionToNext: 'none' },
            { durationSeconds: 4, hasAudio: true, transitionToNext: 'none' },
        ]);

        expect(filter.filters).toHaveLength(9);
        expect(filter.filters[ 1 ]).toBe('[0:a]aformat=sample_rates=44100:channel_layouts=stereo,apad,atrim=duration=6,asetpts=PTS-STARTPTS[a0]');
        expect(filter.filters[ 3 ]).toBe('anullsrc=r=44100:cl=stereo,atrim=duration=5[a1]');
        expect(filter.filters.slice(6)).toEqual([
            '[v0][v1]xfade=transition=fade:duration=0.5:offset=5.5[vj1]',
            '[a0][a1]acrossfade=d=0.5[aj1]',
            '[vj1][aj1][v2][a2]concat=n=2:v=1:a=1[vj2][aj2]',
        ]);
        expect(filter.videoLabel).toBe('vj2');
        expect(filter.audioLabel).toBe('aj2');
        expect(filter.durationSeconds).toBe(14.5);
    });

    it('should normalize every clip to the output format', () => {
        const filter = buildTransitionFilter([ { durationSeconds: 3, hasAudio: true, transitionToNext: 'none' } ]);

        expect(filter.filters[ 0 ]).toBe(
            '[0:v]scale=1280:720:force_original_aspect_ratio=decrease,pad=1280:720:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=24,format=yuv420p,trim=duration=3,setpts=PTS-STARTPTS[v0]',
        );
        expect(filter).toMatchObject({ videoLabel: 'v0', audioLabel: 'a0', durationSeconds: 3 });
    });

    it('should fade through black and limit the overlap to the shorter clip', () => {
        const filter = buildTransitionFilter([
            { durationSeconds: 2, hasAudio: true, transitionToNext: 'fade' },
            { durationSeconds: 0.25, hasAudio: true, transitionToNext: 'none' },
        ]);

        expect(filter.filters[ 4 ]).toBe('[v0][v1]xfade=transition=fadeblack:duration=0.25:offset=1.75[vj1]');
        expect(filter.durationSeconds).toBe(2);
    });

    it('should refuse an empty clip list', () => {
        expect(() => buildTransitionFilter([])).toThrow(PermanentError);
    });
});

describe('buildAudioMixFilter', () => {
    it('should mix effects over silence when the clip has no audio track', () => {
        expect(buildAudioMixFilter(2, false, 6)).toEqual({
            filters: [
                'anullsrc=r=44100:cl=stereo,atrim=duration=6[base]',
                '[1:a]aformat=sample_rates=44100:channel_layouts=stereo,volume=0.8[sfx0]',
                '[2:a]aformat=sample_rates=44100:channel_layouts=stereo,volume=0.8[sfx1]',
                '[base][sfx0][sfx1]amix=inputs=3:duration=first:dropout_transition=0:normalize=0[aout]',
            ],
            outputLabel: 'aout',
        });
    });

    it('should keep the clip track as the base', () => {
        const { filters } = buildAudioMixFilter(1, true, 4.5, 0.5);

        expect(filters).toEqual([
            '[0:a]aformat=sample_rates=44100:channel_layouts=stereo,apad,atrim=duration=4.5[base]',
            '[1:a]aformat=sample_rates=44100:channel_layouts=stereo,volume=0.5[sfx0]',
            '[base][sfx0]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[aout]',
        ]);
    });
});
