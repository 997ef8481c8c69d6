/**
 * Moves the member with the given id to the front, keeping everyone else in their
 * original relative order. Returns an unchanged copy when the member is not present.
 */
export const arrangeMemberFirst = <TMember extends { readonly id: string }>(
  memberId: string,
  members: readonly TMember[],
): TMember[] => {
  const memberIndex: number = members.findIndex(
    (member: TMember): boolean => member.id === memberId,
  );
  const invoker: TMember | undefined = members[memberIndex];

  if (memberIndex < 0 || invoker === undefined) {
    return [...members];
  }

  return [invoker, ...members.slice(0, memberIndex), ...members.slice(memberIndex + 1)];
};
