import type { QueryDescriptor } from './graphql-client.interface.js';

const COMMENTS = `
        comments(first: 100) {
          nodes {
            createdAt
            body
            author {
              login
            }
          }
        }`;

const PAGE_INFO = `
      pageInfo {
        hasNextPage
        endCursor
      }`;

export const REPOSITORY_INFO: QueryDescriptor = {
  name: 'RepositoryInfo',
  kind: 'query',
  document: `
query RepositoryInfo($owner: String!, $name: String!) {
  repository(owner: $owner, name: $name) {
    id
    name
    nameWithOwner
    createdAt
  }
}`,
};

export const PULL_REQUEST_PAGE: QueryDescriptor = {
  name: 'PullRequestPage',
  kind: 'query',
  document: `
query PullRequestPage($owner: String!, $name: String!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $name) {
    pullRequests(first: $first, after: $after, orderBy: {field: UPDATED_AT, direction: DESC}) {${PAGE_INFO}
      nodes {
        number
        title
        url
        createdAt
        updatedAt
        state
        merged
        mergedAt
        closedAt
        body${COMMENTS}
        commits(last: 100) {
          nodes {
            commit {
              message
              committedDate
              author {
                name
              }
            }
          }
        }
      }
    }
  }
}`,
};

export const ISSUE_PAGE: QueryDescriptor = {
  name: 'IssuePage',
  kind: 'query',
  document: `
query IssuePage($owner: String!, $name: String!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $name) {
    issues(first: $first, after: $after, orderBy: {field: UPDATED_AT, direction: DESC}) {${PAGE_INFO}
      nodes {
        number
        title
        url
        createdAt
        updatedAt
        state
        closedAt
        body${COMMENTS}
      }
    }
  }
}`,
};

export const RELEASE_PAGE: QueryDescriptor = {
  name: 'ReleasePage',
  kind: 'query',
  document: `
query ReleasePage($owner: String!, $name: String!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $name) {
    releases(first: $first, after: $after, orderBy: {field: CREATED_AT, direction: DESC}) {${PAGE_INFO}
      nodes {
        name
        tagName
        url
        createdAt
        description
      }
    }
  }
}`,
};

export const DISCUSSION_PAGE: QueryDescriptor = {
  name: 'DiscussionPage',
  kind: 'query',
  document: `
query DiscussionPage($owner: String!, $name: String!, $first: Int!, $after: String) {
  repository(owner: $owner, name: $name) {
    discussions(first: $first, after: $after, orderBy: {field: UPDATED_AT, direction: DESC}) {${PAGE_INFO}
      nodes {
        number
        title
        url
        createdAt
        updatedAt
        closedAt
        body
        category {
          name
        }${COMMENTS}
      }
    }
  }
}`,
};

export const DISCUSSION_CATEGORIES: QueryDescriptor = {
  name: 'DiscussionCategories',
  kind: 'query',
  volatile: true,
  document: `
query DiscussionCategories($owner: String!, $name: String!) {
  repository(owner: $owner, name: $name) {
    discussionCategories(first: 100) {
      nodes {
        id
        name
      }
    }
  }
}`,
};

export const CATEGORY_DISCUSSIONS: QueryDescriptor = {
  name: 'CategoryDiscussions',
  kind: 'query',
  volatile: true,
  document: `
query CategoryDiscussions($owner: String!, $name: String!, $categoryId: ID!, $count: Int!) {
  repository(owner: $owner, name: $name) {
    discussions(first: $count, categoryId: $categoryId, orderBy: {field: UPDATED_AT, direction: DESC}) {
      nodes {
        title
        body
        createdAt
        updatedAt
      }
    }
  }
}`,
};

export const CREATE_DISCUSSION: QueryDescriptor = {
  name: 'CreateDiscussion',
  kind: 'mutation',
  document: `
mutation CreateDiscussion($input: CreateDiscussionInput!) {
  createDiscussion(input: $input) {
    discussion {
      id
      url
    }
  }
}`,
};

export const CREATE_DISCUSSION_CATEGORY: QueryDescriptor = {
  name: 'CreateDiscussionCategory',
  kind: 'mutation',
  document: `
mutation CreateDiscussionCategory($input: CreateDiscussionCategoryInput!) {
  createDiscussionCategory(input: $input) {
    category {
      id
    }
  }
}`,
};
