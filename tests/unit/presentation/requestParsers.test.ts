import {
    parseAvatarArgs,
    parseAvatarJson,
    parseSpeechArgs,
    parseSpeechJson,
    parseVideoArgs,
    parseVideoJson
} from '../../../src/presentation/cli/requestParsers';

describe('requestParsers', () => {
    describe('speech', () => {
        it('should read every JSON field', () => {
            expect(parseSpeechJson({ text: 'hello', output_path: 'out.mp3', voice: 'en-US-Neural2-J', speed: 1.2 }))
                .toEqual({ text: 'hello', outputPath: 'out.mp3', voice: 'en-US-Neural2-J', speed: 1.2 });
        });

        it('should treat null and absent fields alike', () => {
            expect(parseSpeechJson({ text: null, voice: null })).toEqual({ text: '' });
        });

        it('should reject wrongly typed fields', () => {
            expect(() => parseSpeechJson({ text: 'hello', speed: '1.2' }))
                .toThrow('Invalid value for speed: expected a number');
            expect(() => parseSpeechJson({ text: 42 })).toThrow('Invalid value for text: expected a string');
        });

        it('should read positional arguments', () => {
            expect(parseSpeechArgs(['hello', 'out.mp3'])).toEqual({ text: 'hello', outputPath: 'out.mp3' });
            expect(parseSpeechArgs(['hello'])).toEqual({ text: 'hello', outputPath: undefined });
        });
    });

    describe('video', () => {
        it('should default to text_to_video', () => {
            expect(parseVideoJson({ prompt: 'A cat', duration: 3, fps: 30 })).toEqual({
                mode: 'text_to_video',
                prompt: 'A cat',
                durationSeconds: 3,
                fps: 30
            });
        });

        it('should read image_to_video requests', () => {
            expect(parseVideoJson({
                mode: 'image_to_video',
                image_path: 'anchor.png',
                prompt: 'slow zoom',
                output_path: 'anchor.mp4',
                model: 'fal-ai/ltx-video'
            })).toEqual({
                mode: 'image_to_video',
                imagePath: 'anchor.png',
                prompt: 'slow zoom',
                outputPath: 'anchor.mp4',
                model: 'fal-ai/ltx-video'
            });
        });

        it('should reject unknown JSON modes', () => {
            expect(() => parseVideoJson({ mode: 'audio_to_video', prompt: 'x' })).toThrow('Unknown mode: audio_to_video');
        });

        it('should read positional text and image modes', () => {
            expect(parseVideoArgs(['text', 'A cat', 'cat.mp4']))
                .toEqual({ mode: 'text_to_video', prompt: 'A cat', outputPath: 'cat.mp4' });
            expect(parseVideoArgs(['image', 'anchor.png', 'slow zoom', 'anchor.mp4']))
                .toEqual({ mode: 'image_to_video', imagePath: 'anchor.png', prompt: 'slow zoom', outputPath: 'anchor.mp4' });
        });

        it('should name the missing positional field', () => {
            expect(() => parseVideoArgs(['text'])).toThrow('No prompt provided');
            expect(() => parseVideoArgs(['image'])).toThrow('No image_path provided');
        });

        it('should reject unknown positional modes', () => {
            expect(() => parseVideoArgs(['gif', 'x'])).toThrow("Unknown mode: gif. Use 'text' or 'image'");
            expect(() => parseVideoArgs(['foo'])).toThrow("Unknown mode: foo. Use 'text' or 'image'");
        });
    });

    describe('avatar', () => {
        it('should prefer text over audio_path', () => {
            const request = parseAvatarJson({ text: 'Good evening.', audio_path: 'narration.mp3' });

            expect(request.source).toBe('text');
        });

        it('should read the text request fields', () => {
            expect(parseAvatarJson({
                text: 'Good evening.',
                output_path: 'news.mp4',
                voice_id: 'voice-42',
                speed: 1.1,
                background: 'newsroom',
                background_image: 'studio.png',
                callback_url: 'https://hooks.example.test/heygen',
                width: 1080,
                height: 1920
            })).toEqual({
                source: 'text',
                text: 'Good evening.',
                voiceId: 'voice-42',
                speed: 1.1,
                backgroundImage: 'studio.png',
                callbackUrl: 'https://hooks.example.test/heygen',
                outputPath: 'news.mp4',
                background: 'newsroom',
                width: 1080,
                height: 1920
            });
        });

        it('should accept webhook_url as the callback', () => {
            const request = parseAvatarJson({ text: 'Good evening.', webhook_url: 'https://hooks.example.test/done' });

            expect(request).toEqual(expect.objectContaining({ callbackUrl: 'https://hooks.example.test/done' }));
        });

        it('should route text through Google TTS when tts is true', () => {
            expect(parseAvatarJson({ text: 'Good evening.', tts: true, tts_voice: 'en-US-Neural2-J' })).toEqual({
                source: 'speech',
                text: 'Good evening.',
                ttsVoice: 'en-US-Neural2-J'
            });
        });

        it('should fall back to audio_path when text is blank', () => {
            expect(parseAvatarJson({ text: '  ', audio_path: 'narration.mp3', output_path: 'avatar.mp4' })).toEqual({
                source: 'audio',
                audioPath: 'narration.mp3',
                outputPath: 'avatar.mp4'
            });
        });

        it('should require text or audio_path', () => {
            expect(() => parseAvatarJson({ output_path: 'avatar.mp4' })).toThrow('No text or audio_path provided');
        });

        it('should reject background_image outside the HeyGen voice route', () => {
            const message = 'background_image is only supported for text requests without tts';
            expect(() => parseAvatarJson({ text: 'Good evening.', tts: true, background_image: 'studio.png' }))
                .toThrow(message);
            expect(() => parseAvatarJson({ audio_path: 'narration.mp3', background_image: 'studio.png' }))
                .toThrow(message);
        });

        it('should reject a non-boolean tts flag', () => {
            expect(() => parseAvatarJson({ text: 'Good evening.', tts: 'yes' }))
                .toThrow('Invalid value for tts: expected true or false');
        });

        it('should read positional modes', () => {
            expect(parseAvatarArgs(['text', 'Good evening.', 'news.mp4']))
                .toEqual({ source: 'text', text: 'Good evening.', outputPath: 'news.mp4' });
            expect(parseAvatarArgs(['audio', 'narration.mp3']))
                .toEqual({ source: 'audio', audioPath: 'narration.mp3', outputPath: undefined });
            expect(parseAvatarArgs(['speech', 'Good evening.']))
                .toEqual({ source: 'speech', text: 'Good evening.', outputPath: undefined });
        });

        it('should reject unknown positional modes', () => {
            expect(() => parseAvatarArgs(['dance', 'x']))
                .toThrow("Unknown mode: dance. Use 'text', 'audio' or 'speech'");
        });
    });
});
