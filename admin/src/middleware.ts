import { NextResponse, type NextRequest } from "next/server";
import { REALM, matchesCredentials } from "@/lib/basic-auth";

// Edge runtime: no dotenv here, only the variables Next exposes.
export function middleware(request: NextRequest) {
  const user = process.env.ADMIN_USER?.trim();
  const pass = process.env.ADMIN_PASS?.trim();

  if (!user || !pass) {
    return NextResponse.json(
      { error: "ADMIN_USER and ADMIN_PASS must be configured" },
      { status: 500 },
    );
  }

  if (!matchesCredentials(request.headers.get("authorization"), { user, pass })) {
    return NextResponse.json(
      { error: "Authentication required" },
      { status: 401, headers: { "WWW-Authenticate": REALM } },
    );
  }

  return NextResponse.next();
}

export const config = {
  matcher: ["/api/admin/:path*"],
};
