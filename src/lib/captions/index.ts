export type { Cue } from './types';

export { parseSrtCaptions } from './srtParser';

export { resolveCaptionDocument } from './captionSource';
