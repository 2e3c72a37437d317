import jwt from "jsonwebtoken";
import { AccessToken, TokenIssuer } from "../../application/ports/TokenIssuer";
import { UserRole } from "../../domain/entities/User";

export type JwtTokenIssuerConfig = {
  jwtKey: string;
  ttlMinutes: number;
};

export class JwtTokenIssuer implements TokenIssuer {
  constructor(private readonly config: JwtTokenIssuerConfig) {}

  issue(userId: string, role: UserRole): AccessToken {
    const expiresInSeconds = this.config.ttlMinutes * 60;
    const accessToken = jwt.sign({ sub: userId, role }, this.config.jwtKey, {
      expiresIn: expiresInSeconds,
      algorithm: "HS256"
    });
    return { accessToken, tokenType: "bearer", expiresInSeconds };
  }
}
