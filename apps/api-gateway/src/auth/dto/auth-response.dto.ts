/**
 * Token response for register and login, shaped like an OAuth2 token
 * response.
 */
export class AuthResponseDto {
  accessToken: string;
  tokenType: 'Bearer';
  /** Token lifetime in seconds */
  expiresIn: number;

  constructor(accessToken: string, expiresIn: number) {
    this.accessToken = accessToken;
    this.tokenType = 'Bearer';
    this.expiresIn = expiresIn;
  }
}
