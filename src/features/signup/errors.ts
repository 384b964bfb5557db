export type SignupErrorCode = 'missing-role-id' | 'role-not-found' | 'role-update-failed' | 'guild-only';

export class SignupError extends Error {
  constructor(
    readonly code: SignupErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SignupError';
  }
}

export const isSignupError = (error: unknown): error is SignupError => error instanceof SignupError;

export const SIGNUP_ERROR_MESSAGES: Record<SignupErrorCode, string> = {
  'missing-role-id': 'ロールIDが設定されていません。パネル作成時の設定をご確認ください。',
  'role-not-found': 'ロールが見つかりません。',
  'role-update-failed': 'ロールを変更できませんでした。Botの権限とロールの並び順をご確認ください。',
  'guild-only': 'ギルド外では操作できません。'
};
