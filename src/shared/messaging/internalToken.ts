import jwt from "jsonwebtoken";

export const INTERNAL_TOKEN_HEADER = "x-internal-jwt";
export const EVENT_TYPE_HEADER = "x-event-type";

export const signInternalToken = (issuer: string, key: string): string =>
  jwt.sign({ iss: issuer }, key, { expiresIn: "5m", algorithm: "HS256" });

export const isValidInternalToken = (token: string, key: string): boolean => {
  if (token.length === 0) {
    return false;
  }
  try {
    jwt.verify(token, key, { algorithms: ["HS256"] });
    return true;
  } catch {
    return false;
  }
};
