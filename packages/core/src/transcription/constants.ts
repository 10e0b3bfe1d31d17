export const TRANSCRIPTION_TIMEOUT_MS = 600_000
export const MAX_ERROR_DETAIL_CHARS = 400
export const DEFAULT_TRANSCRIPTION_LANGUAGE = 'zh'

export const DASHSCOPE_API_KEY_ENV = 'DASHSCOPE_API_KEY'
export const DASHSCOPE_BASE_URL = 'https://dashscope.aliyuncs.com'
export const DASHSCOPE_MODEL = 'paraformer-v2'
export const DASHSCOPE_POLL_INTERVAL_MS = 5_000

export const OPENAI_API_KEY_ENV = 'OPENAI_API_KEY'
export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1'
export const OPENAI_TRANSCRIPTION_MODEL = 'whisper-1'

export const DISABLE_LOCAL_WHISPER_CPP_ENV = 'CLIPSIFT_DISABLE_LOCAL_WHISPER_CPP'
export const WHISPER_CPP_BINARY_ENV = 'CLIPSIFT_WHISPER_CPP_BINARY'
export const WHISPER_CPP_MODEL_PATH_ENV = 'CLIPSIFT_WHISPER_CPP_MODEL_PATH'

export const FAL_KEY_ENV = 'FAL_KEY'
// Typed as string so the request input is not pinned to the generated endpoint schema.
export const FAL_WIZPER_MODEL: string = 'fal-ai/wizper'

export const GOOGLE_SPEECH_API_KEY_ENV = 'GOOGLE_SPEECH_API_KEY'
export const GOOGLE_SPEECH_ENDPOINT = 'https://www.google.com/speech-api/v2/recognize'
