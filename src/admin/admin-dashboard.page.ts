export function renderAdminDashboardPage(): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Candidate Intake Admin</title>
  <style>
    :root {
      color-scheme: light;
      --bg: #f6f8fb;
      --card: #ffffff;
      --text: #1c2533;
      --muted: #5b6b80;
      --accent: #2457a6;
      --border: #dce3ec;
    }
    * { box-sizing: border-box; }
    body {
      margin: 0;
      font-family: "IBM Plex Sans", "Segoe UI", sans-serif;
      background: var(--bg);
      color: var(--text);
    }
    .wrap { max-width: 1100px; margin: 0 auto; padding: 16px; display: grid; gap: 12px; }
    .card { background: var(--card); border: 1px solid var(--border); border-radius: 14px; padding: 14px; }
    h1, h2 { margin: 0 0 10px; }
    h1 { font-size: 22px; }
    h2 { font-size: 16px; }
    .row { display: flex; gap: 8px; align-items: center; flex-wrap: wrap; }
    input, select { padding: 10px 12px; border: 1px solid var(--border); border-radius: 10px; font-size: 14px; }
    button, a.button {
      border: 0; border-radius: 10px; padding: 10px 12px; background: var(--accent);
      color: #fff; font-weight: 600; cursor: pointer; text-decoration: none; font-size: 14px;
    }
    button.secondary, a.secondary { background: #5d6b7c; }
    .stats { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 8px; }
    .stat { border: 1px solid var(--border); border-radius: 10px; padding: 10px; background: #fbfcfe; }
    .stat .label { color: var(--muted); font-size: 12px; }
    .stat .value { font-size: 20px; font-weight: 700; margin-top: 4px; }
    table { width: 100%; border-collapse: collapse; font-size: 13px; }
    th, td { border-bottom: 1px solid var(--border); text-align: left; padding: 8px; vertical-align: top; }
    th { color: var(--muted); font-weight: 600; }
    tr.clickable { cursor: pointer; }
    .hide { display: none; }
    .status { font-size: 12px; color: var(--muted); min-height: 18px; }
    pre { white-space: pre-wrap; font-family: inherit; margin: 0; }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="card"><h1>Candidate Intake Admin</h1></div>

    <div id="loginCard" class="card">
      <h2>Sign in</h2>
      <div class="row">
        <input id="secretInput" type="password" placeholder="Admin secret" autocomplete="off" />
        <button id="loginBtn">Sign in</button>
      </div>
      <div id="loginStatus" class="status"></div>
    </div>

    <div id="dashboard" class="hide">
      <div class="card">
        <div class="row" style="justify-content: space-between;">
          <h2>Overview</h2>
          <div class="row">
            <a class="button secondary" href="/admin/api/export.json">Export JSON</a>
            <a class="button secondary" href="/admin/api/export.csv">Export CSV</a>
            <button id="refreshBtn" class="secondary">Refresh</button>
            <button id="logoutBtn" class="secondary">Logout</button>
          </div>
        </div>
        <div id="stats" class="stats"></div>
      </div>

      <div class="card">
        <div class="row" style="justify-content: space-between;">
          <h2>Candidates</h2>
          <select id="completeFilter">
            <option value="">All</option>
            <option value="true">Complete</option>
            <option value="false">Incomplete</option>
          </select>
        </div>
        <table>
          <thead>
            <tr><th>ID</th><th>Name</th><th>Email</th><th>Experience</th><th>Tech stack</th><th>Created</th></tr>
          </thead>
          <tbody id="profilesBody"></tbody>
        </table>
      </div>

      <div id="detailCard" class="card hide">
        <h2 id="detailTitle">Candidate</h2>
        <table>
          <thead><tr><th>#</th><th>Question</th><th>Answer</th></tr></thead>
          <tbody id="questionsBody"></tbody>
        </table>
      </div>
    </div>
  </div>

  <script>
    const loginStatusEl = document.getElementById("loginStatus");
    const loginCardEl = document.getElementById("loginCard");
    const dashboardEl = document.getElementById("dashboard");

    async function request(path, options) {
      const response = await fetch(path, {
        credentials: "include",
        headers: { "content-type": "application/json" },
        ...(options || {}),
      });
      const json = await response.json().catch(() => ({}));
      if (!response.ok) {
        throw new Error(json.error || ("HTTP " + response.status));
      }
      return json;
    }

    function setStatus(text, isError) {
      loginStatusEl.textContent = text || "";
      loginStatusEl.style.color = isError ? "#b42318" : "#5b6b80";
    }

    function showDashboard() {
      loginCardEl.classList.add("hide");
      dashboardEl.classList.remove("hide");
    }

    async function login() {
      const secret = document.getElementById("secretInput").value.trim();
      if (!secret) {
        setStatus("Please enter the admin secret", true);
        return;
      }
      setStatus("Signing in...", false);
      try {
        await request("/admin/api/auth/login", { method: "POST", body: JSON.stringify({ secret }) });
        showDashboard();
        await loadDashboard();
      } catch (error) {
        setStatus(error.message || "Login failed", true);
      }
    }

    async function loadSession() {
      try {
        await request("/admin/api/session", { method: "GET" });
        showDashboard();
        await loadDashboard();
      } catch {
        setStatus("", false);
      }
    }

    function renderStats(overview) {
      const entries = [
        ["Candidates", overview.totalCandidates],
        ["Average experience", overview.averageExperience == null ? "-" : overview.averageExperience + " yrs"],
        ["With contact details", overview.completedProfiles],
        ["Started today", overview.createdToday],
        ["Store", overview.store],
      ];
      document.getElementById("stats").innerHTML = entries.map(([label, value]) =>
        '<div class="stat"><div class="label">' + escapeHtml(label) + '</div><div class="value">' + escapeHtml(value) + '</div></div>'
      ).join("");
    }

    function renderProfiles(rows) {
      document.getElementById("profilesBody").innerHTML = rows.map((row) =>
        '<tr class="clickable" data-id="' + escapeHtml(row.profileId) + '">' +
          '<td>' + escapeHtml(row.profileId) + '</td>' +
          '<td>' + escapeHtml(row.fullName || "-") + '</td>' +
          '<td>' + escapeHtml(row.email || "-") + '</td>' +
          '<td>' + escapeHtml(row.yearsExperience == null ? "-" : row.yearsExperience) + '</td>' +
          '<td>' + escapeHtml(row.techStack.join(", ") || "-") + '</td>' +
          '<td>' + escapeHtml(row.createdAt) + '</td>' +
        '</tr>'
      ).join("");
      document.querySelectorAll("#profilesBody tr").forEach((tr) => {
        tr.addEventListener("click", () => loadDetail(tr.getAttribute("data-id")));
      });
    }

    async function loadDetail(profileId) {
      const detail = await request("/admin/api/profiles/" + encodeURIComponent(profileId), { method: "GET" });
      document.getElementById("detailTitle").textContent =
        (detail.summary.profile.fullName || "Candidate") + " #" + detail.summary.profileId;
      document.getElementById("questionsBody").innerHTML = detail.questions.map((item) =>
        '<tr><td>' + (item.questionIndex + 1) + '</td><td><pre>' + escapeHtml(item.question) +
        '</pre></td><td><pre>' + escapeHtml(item.answer || "-") + '</pre></td></tr>'
      ).join("");
      document.getElementById("detailCard").classList.remove("hide");
    }

    async function loadDashboard() {
      const filter = document.getElementById("completeFilter").value;
      const query = filter ? "?complete=" + filter : "";
      const [overview, profiles] = await Promise.all([
        request("/admin/api/overview", { method: "GET" }),
        request("/admin/api/profiles" + query, { method: "GET" }),
      ]);
      renderStats(overview);
      renderProfiles(profiles.profiles || []);
    }

    async function logout() {
      await request("/admin/api/auth/logout", { method: "POST" });
      dashboardEl.classList.add("hide");
      loginCardEl.classList.remove("hide");
      setStatus("Logged out", false);
    }

    function escapeHtml(value) {
      return String(value)
        .replaceAll("&", "&amp;")
        .replaceAll("<", "&lt;")
        .replaceAll(">", "&gt;")
        .replaceAll('"', "&quot;")
        .replaceAll("'", "&#039;");
    }

    document.getElementById("loginBtn").addEventListener("click", login);
    document.getElementById("refreshBtn").addEventListener("click", loadDashboard);
    document.getElementById("logoutBtn").addEventListener("click", logout);
    document.getElementById("completeFilter").addEventListener("change", loadDashboard);
    document.getElementById("secretInput").addEventListener("keydown", (event) => {
      if (event.key === "Enter") {
        login();
      }
    });

    loadSession();
  </script>
</body>
</html>`;
}
