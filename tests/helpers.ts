import type { WritableOutput } from '../src/logger.js';

/** Runs `fn` and returns what it threw. Fails the test when nothing is thrown. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

export async function catchRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

export function createBuffer(): WritableOutput & { text(): string; lines(): string[] } {
  const chunks: string[] = [];
  return {
    write(s: string) {
      chunks.push(s);
    },
    text() {
      return chunks.join('');
    },
    lines() {
      return chunks.join('').split('\n').filter((l) => l.length > 0);
    },
  };
}

export const APP_CONFIG = `# This is a comment
# Following code is a flat section
global {
    # Following items are pairs
    prop_1 = 100
    prop_2 = true
    prop_3 = "hello"

    # Following item is a list
    prop_4 = [100, true, "hello"]
}

# Following code is a nested section
project {
    one {
        one { prop = "hello" }
    }

    two {
        prop = [100, true, "hello"]
        # foo = "bar"
        fool2 = "baz"
    }
}

applet {
    proj_1 {
        host_name = "example.com"
        shared_object = "../proj-1/lib/libproj.so"
    }
}
`;
