import { SignJWT, jwtVerify, type JWTPayload } from "jose";

export type SignJwtOptions = {
  expiresIn?: number | string;
};

function resolveSecret(): Uint8Array {
  return new TextEncoder().encode(process.env.JWT_SECRET ?? "dev-secret");
}

export async function signJwt(payload: JWTPayload, opts: SignJwtOptions = {}): Promise<string> {
  const builder = new SignJWT(payload).setProtectedHeader({ alg: "HS256", typ: "JWT" }).setIssuedAt();
  // set issuer/audience from env when available
  if (process.env.AUTH_ISSUER) {
    builder.setIssuer(process.env.AUTH_ISSUER);
  }
  if (process.env.AUTH_AUDIENCE) {
    builder.setAudience(process.env.AUTH_AUDIENCE);
  }
  builder.setExpirationTime(opts.expiresIn ?? "1h");
  return builder.sign(resolveSecret());
}

export async function verifyJwt(token: string): Promise<JWTPayload> {
  const { payload } = await jwtVerify(token, resolveSecret(), {
    issuer: process.env.AUTH_ISSUER,
    audience: process.env.AUTH_AUDIENCE,
  });
  return payload;
}
