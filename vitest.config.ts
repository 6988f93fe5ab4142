import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
      GEMINI_API_KEY: '',
      LOG_FILE: '',
      HIGHLIGHTS_OUTPUT_DIR: './highlights',
      YTDLP_BIN: 'yt-dlp',
      YTDLP_PYTHON_BIN: '',
      YTDLP_COOKIES_FILE: '',
      YTDLP_EXTRA_ARGS: '',
      FFMPEG_BIN: 'ffmpeg',
      FFPROBE_BIN: 'ffprobe',
    },
  },
})
