import { ConfigMismatchError, ValidationError } from "./errors";
import { errorResponse } from "./http";

describe("errorResponse", () => {
  it("answers 400 for invalid input", async () => {
    const response = errorResponse(new ValidationError("Query must not be empty"), "Failed to search");

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: "Query must not be empty" });
  });

  it("answers 409 with both settings for a configuration mismatch", async () => {
    const error = new ConfigMismatchError(
      "Query embedder does not match index: model b != a",
      { model_name: "a" },
      { model_name: "b" }
    );

    const response = errorResponse(error, "Failed to search");

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({
      error: "Query embedder does not match index: model b != a",
      expected: { model_name: "a" },
      actual: { model_name: "b" },
    });
  });

  it("answers 500 and logs anything else", async () => {
    const errorLog = jest.spyOn(console, "error").mockImplementation(() => undefined);

    const response = errorResponse(new Error("disk unavailable"), "Failed to search");

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: "Failed to search",
      details: "Error: disk unavailable",
    });
    expect(errorLog).toHaveBeenCalledTimes(1);
    errorLog.mockRestore();
  });
});
