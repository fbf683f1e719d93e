import { getCommitFromPayload, getRepoFromPayload, toPushEvent } from './push-payload';

describe('push payloads', () => {
  const github = {
    ref: 'refs/heads/master',
    after: '9fceb02d0ae598e95dc970b74767f19372d61af8',
    repository: { full_name: 'example/widgets', clone_url: 'https://github.com/example/widgets.git' },
  };
  const gitlab = {
    ref: 'refs/heads/develop',
    checkout_sha: 'da1560886d4f094c3e6c9ef40349f7d38b5d27d7',
    project: { path_with_namespace: 'example/widgets', web_url: 'https://gitlab.example.com/example/widgets' },
  };

  it('finds the repository in plain, GitHub and GitLab payloads', () => {
    expect(getRepoFromPayload({ repo: 'https://github.com/example/widgets.git' })).toBe(
      'https://github.com/example/widgets.git',
    );
    expect(getRepoFromPayload(github)).toBe('example/widgets');
    expect(getRepoFromPayload({ repository: { clone_url: 'https://github.com/example/widgets.git' } })).toBe(
      'https://github.com/example/widgets.git',
    );
    expect(getRepoFromPayload(gitlab)).toBe('example/widgets');
    expect(getRepoFromPayload({ repository: 'not-an-object' })).toBeNull();
  });

  it('finds the pushed commit', () => {
    expect(getCommitFromPayload(github)).toBe('9fceb02d0ae598e95dc970b74767f19372d61af8');
    expect(getCommitFromPayload(gitlab)).toBe('da1560886d4f094c3e6c9ef40349f7d38b5d27d7');
    expect(getCommitFromPayload({ commit: 'abc123', after: 'def456' })).toBe('abc123');
  });

  it('builds a push event from a branch ref', () => {
    expect(toPushEvent(github, 'example/widgets')).toEqual({
      type: 'push',
      branch: 'master',
      repository: 'example/widgets',
      commit: '9fceb02d0ae598e95dc970b74767f19372d61af8',
    });
    expect(toPushEvent({ branch: 'feature/x' }, 'example/widgets')).toEqual({
      type: 'push',
      branch: 'feature/x',
      repository: 'example/widgets',
    });
  });

  it('ignores tag pushes', () => {
    expect(toPushEvent({ ref: 'refs/tags/v1.0.0' }, 'example/widgets')).toBeNull();
  });
});
