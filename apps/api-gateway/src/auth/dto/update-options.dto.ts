import { IsBoolean } from 'class-validator';

/** Body of PATCH /auth/me/options. */
export class UpdateOptionsDto {
  @IsBoolean()
  showOnLeaderboard!: boolean;
}
