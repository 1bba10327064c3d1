import { NextResponse } from "next/server";
import { ConfigMismatchError, ValidationError } from "./errors";

/**
 * Map an error to a JSON response: usage errors 400, configuration
 * mismatches 409, everything else 500
 */
export function errorResponse(error: unknown, message: string): NextResponse {
  if (error instanceof ValidationError) {
    return NextResponse.json({ error: error.message }, { status: 400 });
  }
  if (error instanceof ConfigMismatchError) {
    return NextResponse.json(
      { error: error.message, expected: error.expected, actual: error.actual },
      { status: 409 }
    );
  }

  console.error(`${message}:`, error);
  return NextResponse.json(
    { error: message, details: String(error) },
    { status: 500 }
  );
}
