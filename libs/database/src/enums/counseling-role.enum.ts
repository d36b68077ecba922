export enum CounselingRole {
  USER = 'user',
  ASSISTANT = 'assistant',
}
