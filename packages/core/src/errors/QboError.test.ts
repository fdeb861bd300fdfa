import {
  BadRequestError,
  ForbiddenError,
  InternalServerError,
  NotFoundError,
  QboError,
  QboHttpError,
  ServiceUnavailableError,
  TooManyRequestsError,
  UnauthorizedError,
  createHttpError,
  extractFault,
  formatFault,
} from "./QboError";

const faultBody = {
  Fault: {
    Error: [
      {
        Message: "Duplicate Name Exists Error",
        Detail: "The name supplied already exists.",
        code: "6240",
        element: "DisplayName",
      },
    ],
    type: "ValidationFault",
  },
  time: "2024-01-01T00:00:00.000-07:00",
};

describe("extractFault", () => {
  it("should parse the Fault block", () => {
    expect(extractFault(faultBody)).toEqual({
      type: "ValidationFault",
      errors: [
        {
          message: "Duplicate Name Exists Error",
          detail: "The name supplied already exists.",
          code: "6240",
          element: "DisplayName",
        },
      ],
    });
  });

  it("should accept the lower-case fault key", () => {
    const fault = extractFault({
      fault: { error: [{ message: "Token expired", code: 3200 }], type: "AUTHENTICATION" },
    });
    expect(fault).toEqual({
      type: "AUTHENTICATION",
      errors: [{ message: "Token expired", detail: undefined, code: "3200", element: undefined }],
    });
  });

  it("should return undefined for bodies without a fault", () => {
    expect(extractFault({ Customer: {} })).toBeUndefined();
    expect(extractFault("Bad Gateway")).toBeUndefined();
  });
});

describe("formatFault", () => {
  it("should join message, detail and code", () => {
    const fault = extractFault(faultBody);
    expect(fault && formatFault(fault)).toBe(
      "Duplicate Name Exists Error: The name supplied already exists. (code 6240)",
    );
  });
});

describe("createHttpError", () => {
  const statusCases: Array<[number, typeof QboHttpError]> = [
    [400, BadRequestError],
    [401, UnauthorizedError],
    [403, ForbiddenError],
    [404, NotFoundError],
    [429, TooManyRequestsError],
    [500, InternalServerError],
    [502, ServiceUnavailableError],
    [503, ServiceUnavailableError],
    [504, ServiceUnavailableError],
  ];

  it.each(statusCases)("should map status %i to its error class", (status, ErrorClass) => {
    const error = createHttpError({ status, body: "" });
    expect(error).toBeInstanceOf(ErrorClass);
    expect(error).toBeInstanceOf(QboHttpError);
    expect(error).toBeInstanceOf(QboError);
    expect(error.status).toBe(status);
  });

  it("should treat a throttled 403 as too many requests", () => {
    const error = createHttpError({
      status: 403,
      body: { Fault: { Error: [{ Message: "ThrottleExceeded" }], type: "SERVICE" } },
    });
    expect(error).toBeInstanceOf(TooManyRequestsError);
  });

  it("should fall back to QboHttpError for other statuses", () => {
    const error = createHttpError({ status: 418, body: "" });
    expect(error.constructor).toBe(QboHttpError);
    expect(error.name).toBe("QboHttpError");
  });

  it("should build the message from the fault", () => {
    const error = createHttpError({
      status: 400,
      statusText: "Bad Request",
      body: faultBody,
      method: "post",
      url: "https://sandbox-quickbooks.api.intuit.com/v3/company/1/customer",
      intuitTid: "tid-1",
    });

    expect(error.name).toBe("BadRequestError");
    expect(error.message).toBe(
      "HTTP 400 Bad Request for POST https://sandbox-quickbooks.api.intuit.com/v3/company/1/customer: " +
        "Duplicate Name Exists Error: The name supplied already exists. (code 6240)",
    );
    expect(error.fault?.type).toBe("ValidationFault");
    expect(error.intuitTid).toBe("tid-1");
    expect(error.body).toBe(faultBody);
  });

  it("should keep the status line when there is no fault", () => {
    expect(createHttpError({ status: 503, statusText: "Service Unavailable" }).message).toBe(
      "HTTP 503 Service Unavailable",
    );
  });
});
