export { BackButton, formatUnreadBadge, MAX_UNREAD_BADGE } from './BackButton';
export type { BackButtonProps } from './BackButton';
