export {
  type AuthContext,
  SESSION_COOKIE_NAME,
  extractToken,
  createOptionalJwtAuthenticationMiddleware,
  getAuthContext,
} from "./auth.js";
export { signJwt, verifyJwt, type SignJwtOptions } from "./jwt.js";
export {
  CORRELATION_ID_HEADER,
  CORRELATION_ID_PATTERN,
  cookieParserMiddleware,
  correlationId,
} from "./middleware.js";
export { createJwtCookie, setJwtCookieOnResponse, type JwtCookieOptions } from "./cookie.js";
