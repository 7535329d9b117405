export class BattleSetupError extends Error {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'BattleSetupError'
    this.issues = issues
  }
}
