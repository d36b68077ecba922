/**
 * Named units of background work. The worker registers exactly one
 * handler per member.
 */
export enum JobType {
  /** Single-photo Norwood analysis */
  ANALYSIS = 'analysis',

  /** Quality check of one certification photo */
  PHOTO_VALIDATION = 'photo_validation',

  /** Three-photo diagnosis plus certificate rendering */
  CERTIFICATION_DIAGNOSIS = 'certification_diagnosis',

  /** Assistant answer in a counseling session */
  COUNSELING_REPLY = 'counseling_reply',

  /** Pick personas for a new forum thread */
  FORUM_SCHEDULE_INIT = 'forum_schedule_init',

  /** Pull persona schedules forward after a user reply */
  FORUM_SCHEDULE_BUMP = 'forum_schedule_bump',

  /** Scheduled persona reply to a thread */
  FORUM_AGENT_REPLY = 'forum_agent_reply',

  /** Persona answer to a user who replied to a persona */
  FORUM_DIRECT_REPLY = 'forum_direct_reply',
}
