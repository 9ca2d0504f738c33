/**
 * Jest Test Setup
 *
 * Global test configuration and mocks
 */

// Mock AWS SDK clients. Commands keep their input so tests can inspect what
// a repository sent.
jest.mock("@aws-sdk/client-dynamodb", () => ({
  DynamoDBClient: jest.fn(),
}))

jest.mock("@aws-sdk/lib-dynamodb", () => {
  const command = (name: string) => jest.fn().mockImplementation((input: unknown) => ({ name, input }))
  return {
    DynamoDBDocumentClient: {
      from: jest.fn(),
    },
    GetCommand: command("Get"),
    PutCommand: command("Put"),
    DeleteCommand: command("Delete"),
    UpdateCommand: command("Update"),
    QueryCommand: command("Query"),
    BatchGetCommand: command("BatchGet"),
    TransactWriteCommand: command("TransactWrite"),
  }
})
