export const typeDefs = /* GraphQL */ `
  enum AttemptStatus {
    published
    failed
  }

  type Board {
    boardId: Int!
    lastPublishedClock: String
    gasPriceWei: String
  }

  type PublishAttempt {
    id: ID!
    boardId: Int!
    clock: String!
    status: AttemptStatus!
    endpoint: String
    txHash: String
    gasPriceWei: String
    fee: String
    createdAt: String!
  }

  type PublishAttemptEdge {
    cursor: String!
    node: PublishAttempt!
  }

  type PublishAttemptConnection {
    edges: [PublishAttemptEdge!]!
    pageInfo: PageInfo!
  }

  type PageInfo {
    endCursor: String
    hasNextPage: Boolean!
  }

  type FeeLedger {
    total: String!
    entries: [String!]!
  }

  type Query {
    health: String!
    board(boardId: Int!): Board!
    publishAttempts(boardId: Int, first: Int!, after: String): PublishAttemptConnection!
    feeLedger: FeeLedger!
  }
`;
