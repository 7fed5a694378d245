/*
 *  This file is part of CoCalc: Copyright © 2025 Sagemath, Inc.
 *  License: MS-RSL – see LICENSE.md for details
 */

import { Client } from "pg";
import {
  INSERT_VERIFICATION,
  insertVerificationRecord,
  VerificationRecord,
} from "./verification";

const mockConnect = jest.fn();
const mockQuery = jest.fn();
const mockEnd = jest.fn();

jest.mock("pg", () => ({
  Client: jest.fn(() => ({
    connect: mockConnect,
    query: mockQuery,
    end: mockEnd,
  })),
}));

const record: VerificationRecord = {
  user_id: 42,
  email: "a@example.com",
  verification_token: "42:2026-10-18T12:02:00.000Z",
  expiration_time: new Date("2026-10-18T12:02:00.000Z"),
  is_verified: false,
};

describe("insertVerificationRecord", () => {
  beforeEach(() => {
    mockConnect.mockResolvedValue(undefined);
    mockQuery.mockResolvedValue({ rows: [], rowCount: 1 });
    mockEnd.mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.mocked(Client).mockClear();
    mockConnect.mockReset();
    mockQuery.mockReset();
    mockEnd.mockReset();
  });

  it("inserts the record in a transaction and closes the connection", async () => {
    await insertVerificationRecord(record);

    expect(Client).toHaveBeenCalledTimes(1);
    expect(mockConnect).toHaveBeenCalledTimes(1);
    expect(mockQuery.mock.calls).toEqual([
      ["BEGIN"],
      [
        INSERT_VERIFICATION,
        [
          42,
          "a@example.com",
          "42:2026-10-18T12:02:00.000Z",
          new Date("2026-10-18T12:02:00.000Z"),
          false,
        ],
      ],
      ["COMMIT"],
    ]);
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });

  it("opens a new connection for every record", async () => {
    await insertVerificationRecord(record);
    await insertVerificationRecord(record);

    expect(Client).toHaveBeenCalledTimes(2);
    expect(mockEnd).toHaveBeenCalledTimes(2);
  });

  it("rolls back, closes the connection and rethrows when the insert fails", async () => {
    mockQuery.mockImplementation(async (sql: string) => {
      if (sql == INSERT_VERIFICATION) {
        throw new Error('relation "email_verification" does not exist');
      }
      return { rows: [] };
    });

    await expect(insertVerificationRecord(record)).rejects.toThrow(
      'relation "email_verification" does not exist',
    );
    expect(mockQuery).toHaveBeenLastCalledWith("ROLLBACK");
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });

  it("reports the insert error even when the rollback fails too", async () => {
    mockQuery.mockImplementation(async (sql: string) => {
      if (sql == "BEGIN") {
        return { rows: [] };
      }
      throw new Error(`${sql.trim().split(" ")[0]} failed`);
    });

    await expect(insertVerificationRecord(record)).rejects.toThrow(
      "INSERT failed",
    );
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });

  it("does not query when the connection cannot be opened", async () => {
    mockConnect.mockRejectedValue(new Error("ECONNREFUSED"));

    await expect(insertVerificationRecord(record)).rejects.toThrow(
      "ECONNREFUSED",
    );
    expect(mockQuery).not.toHaveBeenCalled();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });

  it("keeps the connect error when closing the connection fails too", async () => {
    mockConnect.mockRejectedValue(new Error("ECONNREFUSED"));
    mockEnd.mockRejectedValue(new Error("Client was never connected"));

    await expect(insertVerificationRecord(record)).rejects.toThrow(
      "ECONNREFUSED",
    );
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });

  it("uses the client factory it is given", async () => {
    const createClient = jest.fn(() => new Client());

    await insertVerificationRecord(record, createClient);

    expect(createClient).toHaveBeenCalledTimes(1);
    expect(mockQuery).toHaveBeenCalledWith("COMMIT");
  });
});
