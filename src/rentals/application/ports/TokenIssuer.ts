import { UserRole } from "../../domain/entities/User";

export type AccessToken = {
  accessToken: string;
  tokenType: "bearer";
  expiresInSeconds: number;
};

export interface TokenIssuer {
  issue(userId: string, role: UserRole): AccessToken;
}
