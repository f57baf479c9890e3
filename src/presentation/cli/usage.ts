export const TTS_USAGE = [
    'Usage:',
    "  CLI: media-tts 'your text' [output.mp3]",
    '  JSON stdin: echo \'{"text":"...","output_path":"...","voice":"en-US-Neural2-F","speed":1.0}\' | media-tts'
].join('\n');

export const VIDEO_USAGE = [
    'Usage:',
    "  Text-to-video: media-video text 'your prompt' [output.mp4]",
    "  Image-to-video: media-video image image.png 'motion prompt' [output.mp4]",
    '  JSON stdin: echo \'{"mode":"text_to_video","prompt":"...","output_path":"..."}\' | media-video'
].join('\n');

export const AVATAR_USAGE = [
    'Usage:',
    "  From text (HeyGen voice): media-avatar text 'script' [output.mp4]",
    '  From audio file: media-avatar audio narration.mp3 [output.mp4]',
    "  From text via Google TTS: media-avatar speech 'script' [output.mp4]",
    '  JSON stdin: echo \'{"text":"...","output_path":"...","background":"newsroom","callback_url":"..."}\' | media-avatar',
    '  Requires HEYGEN_API_KEY.'
].join('\n');
