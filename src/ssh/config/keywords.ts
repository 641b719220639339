// Keywords of ssh_config(5), in their canonical spelling.
export const KEYWORDS = [
  "Host", "Include", "AddKeysToAgent", "AddressFamily", "BatchMode", "BindAddress",
  "BindInterface", "CanonicalDomains", "CanonicalizeFallbackLocal", "CanonicalizeHostname",
  "CanonicalizeMaxDots", "CanonicalizePermittedCNAMEs", "CASignatureAlgorithms", "CertificateFile",
  "ChallengeResponseAuthentication", "ChannelTimeout", "CheckHostIP", "Ciphers",
  "ClearAllForwardings", "Compression", "ConnectionAttempts", "ConnectTimeout", "ControlMaster",
  "ControlPath", "ControlPersist", "DynamicForward", "EnableEscapeCommandline", "EnableSSHKeysign",
  "EscapeChar", "ExitOnForwardFailure", "FingerprintHash", "ForkAfterAuthentication",
  "ForwardAgent", "ForwardX11", "ForwardX11Timeout", "ForwardX11Trusted", "GatewayPorts",
  "GlobalKnownHostsFile", "GSSAPIAuthentication", "GSSAPIDelegateCredentials", "HashKnownHosts",
  "HostbasedAcceptedAlgorithms", "HostbasedAuthentication", "HostKeyAlgorithms", "HostKeyAlias",
  "HostName", "IdentitiesOnly", "IdentityAgent", "IdentityFile", "IgnoreUnknown", "IPQoS",
  "KbdInteractiveAuthentication", "KbdInteractiveDevices", "KexAlgorithms", "KnownHostsCommand",
  "LocalCommand", "LocalForward", "LogLevel", "LogVerbose", "MACs", "Match",
  "NoHostAuthenticationForLocalhost", "NumberOfPasswordPrompts", "ObscureKeystrokeTiming",
  "PasswordAuthentication", "PermitLocalCommand", "PermitRemoteOpen", "PKCS11Provider", "Port",
  "PreferredAuthentications", "ProxyCommand", "ProxyJump", "ProxyUseFdpass",
  "PubkeyAcceptedAlgorithms", "PubkeyAcceptedKeyTypes", "PubkeyAuthentication", "RekeyLimit",
  "RemoteCommand", "RemoteForward", "RequestTTY", "RequiredRSASize", "RevokedHostKeys",
  "SecurityKeyProvider", "SendEnv", "ServerAliveCountMax", "ServerAliveInterval", "SessionType",
  "SetEnv", "StdinNull", "StreamLocalBindMask", "StreamLocalBindUnlink", "StrictHostKeyChecking",
  "SyslogFacility", "Tag", "TCPKeepAlive", "Tunnel", "TunnelDevice", "UpdateHostKeys",
  "UseKeychain", "User", "UserKnownHostsFile", "VerifyHostKeyDNS", "VisualHostKey",
  "XAuthLocation",
] as const;

export type Keyword = (typeof KEYWORDS)[number];
