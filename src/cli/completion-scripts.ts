// src/cli/completion-scripts.ts
// Shell glue that asks `pkgscout complete` for candidates.

export const SHELLS = ['bash', 'zsh'] as const
export type Shell = (typeof SHELLS)[number]

const BASH = `# bash completion for pkgscout
# Load with: source <(pkgscout completion bash)
_pkgscout_complete() {
    local cur="\${COMP_WORDS[COMP_CWORD]}"
    local commands="search suggest purposes complete record completion cache stats mcp-serve help"

    if [[ \${COMP_CWORD} -le 1 ]]; then
        COMPREPLY=($(compgen -W "$commands" -- "$cur"))
        return
    fi

    local context="install"
    case "\${COMP_WORDS[1]}" in
        search) context="search" ;;
        record) context="install" ;;
        *) return ;;
    esac

    local completions
    completions=$(pkgscout complete "$cur" --context "$context" 2>/dev/null)
    COMPREPLY=($(compgen -W "$completions" -- "$cur"))
}
complete -F _pkgscout_complete pkgscout
`

const ZSH = `#compdef pkgscout
# zsh completion for pkgscout
# Load with: source <(pkgscout completion zsh)
_pkgscout() {
    local -a commands
    commands=(search suggest purposes complete record completion cache stats mcp-serve help)

    if (( CURRENT == 2 )); then
        compadd -- $commands
        return
    fi

    local context=install
    case $words[2] in
        search) context=search ;;
        record) context=install ;;
        *) return ;;
    esac

    local -a candidates
    candidates=(\${(f)"$(pkgscout complete "$words[CURRENT]" --context $context 2>/dev/null)"})
    compadd -- $candidates
}
compdef _pkgscout pkgscout
`

export function completionScript(shell: Shell): string {
  return shell === 'bash' ? BASH : ZSH
}
