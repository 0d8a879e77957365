export const SESSION_HELP_TEXT = `📖 使用帮助 / Help

🤖 AI 提供商 / AI Providers

API 层（快速响应）/ API layer (fast replies):
  @claude 或 @claude-api - Claude API
  @gemini 或 @gemini-api - Gemini API
  @openai 或 @gpt - OpenAI API

CLI 层（代码能力）/ CLI layer (code access):
  @code 或 @claude-cli - Claude Code CLI
  @gemini-cli - Gemini CLI

💡 智能路由 / Smart routing
  不带前缀时自动选择合适的执行器
  Without a prefix the bot picks a suitable executor

📝 会话命令 / Session commands
  /new 或 新会话 - 开始新会话 / start a new session
  /session 或 会话信息 - 当前会话信息 / current session info
  /history 或 历史记录 - 对话历史 / conversation history
  /help 或 帮助 - 显示本帮助 / show this help

💬 示例 / Examples
  @claude 什么是人工智能？
  @code 查看项目结构
  什么是机器学习？
  /new`;
