import { env } from '../config/env';

export enum ActivityType {
  REACTION = 'reaction',
  COMMENT = 'comment',
  POLL_VOTE = 'poll_vote',
}

export const REACTION_POINTS = 10;
export const COMMENT_POINTS = 30;

export type PointWeights = Record<ActivityType, number>;

export interface ActivityCounts {
  reactions: number;
  comments: number;
  pollVotes: number;
}

export const defaultPointWeights: PointWeights = {
  [ActivityType.REACTION]: REACTION_POINTS,
  [ActivityType.COMMENT]: COMMENT_POINTS,
  [ActivityType.POLL_VOTE]: env.scoring.pollVotePoints,
};

export function pointsFor(counts: ActivityCounts, weights: PointWeights = defaultPointWeights): number {
  return (
    counts.reactions * weights[ActivityType.REACTION] +
    counts.comments * weights[ActivityType.COMMENT] +
    counts.pollVotes * weights[ActivityType.POLL_VOTE]
  );
}
