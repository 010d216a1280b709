export * from './audio-playback.queue';
export * from './chat-connection';
export * from './chat-session.controller';
export * from './ffplay-audio.sink';
export * from './speech-capture.adapter';
export * from './voice-chat.client';
