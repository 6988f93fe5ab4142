import * as dotenv from 'dotenv';
dotenv.config();

export type LogFormat = 'json' | 'pretty';

function logFormat(v: string | undefined): LogFormat {
    return v === 'pretty' ? 'pretty' : 'json';
}

export const ENV = {
    // Gemini credential for description normalization; blank skips the step
    geminiApiKey: process.env.GEMINI_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    outputDir: process.env.HIGHLIGHTS_OUTPUT_DIR || './highlights',
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
    ffprobeBin: process.env.FFPROBE_BIN || 'ffprobe',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: logFormat(process.env.LOG_FORMAT),
    // Minimum gap between progress:<step> events
    progressIntervalMs: Number(process.env.PROGRESS_INTERVAL_MS || 1500),
    // Optional: mirror every log line (JSON) into this file
    logFile: process.env.LOG_FILE || '',
};
