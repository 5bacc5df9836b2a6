import { parse as parseSdp, write as writeSdp } from 'sdp-transform';

export type MediaDirection = 'sendrecv' | 'sendonly' | 'recvonly' | 'inactive';

export const SDP_CONTENT_TYPE = 'application/sdp';

/**
 * Rewrites the direction attribute of every media section (and the session
 * level, when present) and bumps the origin session version, as a re-INVITE
 * offer requires.
 */
export const setMediaDirection = (sdp: string, direction: MediaDirection): string => {
  const session = parseSdp(sdp);
  if (session.direction) session.direction = direction;
  for (const media of session.media) {
    media.direction = direction;
  }
  if (session.origin) {
    session.origin.sessionVersion = Number(session.origin.sessionVersion) + 1;
  }
  return writeSdp(session);
};

export const getMediaDirection = (sdp: string): MediaDirection | undefined => {
  if (!sdp.trim()) return undefined;
  const session = parseSdp(sdp);
  return session.media[0]?.direction ?? session.direction ?? 'sendrecv';
};

/** True when the peer stopped sending to us (remote hold). */
export const isRemoteHold = (sdp: string): boolean => {
  const direction = getMediaDirection(sdp);
  return direction === 'sendonly' || direction === 'inactive';
};
