import type { SessionId, TopicKind } from '@parley/types';
import { createSessionId } from '@parley/types';
import { describe, it, expectTypeOf } from 'vitest';

describe('Brand 타입 안전성', () => {
  it('팩토리 함수가 올바른 Brand 타입을 반환한다', () => {
    expectTypeOf(createSessionId('')).toMatchTypeOf<SessionId>();
  });

  it('plain string은 SessionId에 할당 불가하다', () => {
    // @ts-expect-error -- plain string은 Brand 타입에 할당 불가
    const _sid: SessionId = 'abc';
  });
});

describe('TopicKind', () => {
  it('다섯 가지 토픽 종류만 허용한다', () => {
    expectTypeOf<TopicKind>().toEqualTypeOf<
      'guild' | 'channel' | 'user' | 'friend' | 'lazy-member-list'
    >();
  });
});
