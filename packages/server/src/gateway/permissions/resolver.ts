// packages/server/src/gateway/permissions/resolver.ts
import type { OverwriteRecord, RoleRecord } from '@parley/types';
import { ALL_PERMISSIONS, PERMISSIONS, parsePermissions } from './flags.js';

/** 권한 계산 입력 -- 스토리지 레코드에서 바로 구성 */
export interface PermissionInput {
  readonly userId: string;
  readonly guild: { readonly id: string; readonly ownerId: string };
  /** 길드의 전체 역할 (@everyone 포함, id === guild.id) */
  readonly roles: readonly RoleRecord[];
  /** 멤버가 보유한 역할 ID */
  readonly memberRoleIds: readonly string[];
  /** 채널 덮어쓰기 -- 없으면 길드 레벨 권한 */
  readonly overwrites?: readonly OverwriteRecord[];
  /** 계정 기본 플래그 */
  readonly baseFlags?: bigint;
}

/**
 * 스노우플레이크 비교 (숫자 순서).
 * 10진수 문자열은 길이 → 사전순으로 비교하면 수치 비교와 같다.
 */
export function compareSnowflakes(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/** 역할 정렬: position 오름차순, 동률이면 id 오름차순 */
export function compareRoles(a: RoleRecord, b: RoleRecord): number {
  return a.position - b.position || compareSnowflakes(a.id, b.id);
}

/**
 * 길드 레벨 권한
 *
 * 1. 소유자 → ALL
 * 2. 기본 플래그 | @everyone
 * 3. 보유 역할을 position 오름차순으로 OR (이 단계에서는 deny 없음)
 */
export function computeBasePermissions(input: PermissionInput): bigint {
  if (input.userId === input.guild.ownerId) {
    return ALL_PERMISSIONS;
  }

  const everyone = input.roles.find((role) => role.id === input.guild.id);
  let perms = (input.baseFlags ?? 0n) | parsePermissions(everyone?.permissions);

  const held = new Set(input.memberRoleIds);
  const memberRoles = input.roles
    .filter((role) => role.id !== input.guild.id && held.has(role.id))
    .sort(compareRoles);

  for (const role of memberRoles) {
    perms |= parsePermissions(role.permissions);
  }

  return perms;
}

/**
 * 채널 유효 권한
 *
 * 관리자 비트가 있으면 덮어쓰기를 무시하고 ALL.
 * 역할 덮어쓰기는 역할 position 오름차순으로 하나씩 (deny 해제 → allow 설정),
 * 멤버 덮어쓰기는 마지막에 한 번 적용되어 항상 이긴다.
 */
export function computePermissions(input: PermissionInput): bigint {
  const base = computeBasePermissions(input);
  if (base === ALL_PERMISSIONS || (base & PERMISSIONS.ADMINISTRATOR) !== 0n) {
    return ALL_PERMISSIONS;
  }

  const overwrites = input.overwrites;
  if (!overwrites || overwrites.length === 0) {
    return base;
  }

  const rolesById = new Map(input.roles.map((role) => [role.id, role]));
  const held = new Set(input.memberRoleIds);
  held.add(input.guild.id);

  const roleOverwrites: { role: RoleRecord; overwrite: OverwriteRecord }[] = [];
  let memberOverwrite: OverwriteRecord | undefined;

  for (const overwrite of overwrites) {
    if (overwrite.type === 'member') {
      if (overwrite.id === input.userId) {
        memberOverwrite = overwrite;
      }
      continue;
    }
    const role = rolesById.get(overwrite.id);
    if (role && held.has(role.id)) {
      roleOverwrites.push({ role, overwrite });
    }
  }

  roleOverwrites.sort((a, b) => compareRoles(a.role, b.role));

  let perms = base;
  for (const { overwrite } of roleOverwrites) {
    perms = applyOverwrite(perms, overwrite);
  }
  if (memberOverwrite) {
    perms = applyOverwrite(perms, memberOverwrite);
  }

  return perms;
}

function applyOverwrite(perms: bigint, overwrite: OverwriteRecord): bigint {
  return (perms & ~parsePermissions(overwrite.deny)) | parsePermissions(overwrite.allow);
}
